import { cellText, isBlank, isYes } from '../boolean.js';
import { TemplateDefinitionError } from '../errors.js';
import {
  PERMISSION_CATEGORIES,
  emptyOrganizationPermissions,
  emptyWorkspacePermissions,
  type PermissionTarget,
} from '../permissions/catalog.js';
import type { Cell, Sheet, Workbook } from '../tabular/csvWorkbook.js';
import type { RoleTemplate } from '../types.js';

const NAME_LABEL = 'Name';

/** A template with every known permission denied */
export function seedRoleTemplate(name: string): RoleTemplate {
  return {
    name,
    organization: emptyOrganizationPermissions(),
    primaryWorkspaces: emptyWorkspacePermissions(),
    otherWorkspaces: emptyWorkspacePermissions(),
  };
}

function grant(template: RoleTemplate, target: PermissionTarget, value: boolean): void {
  switch (target.scope) {
    case 'organization':
      template.organization[target.key] = value;
      break;
    case 'primaryWorkspaces':
      template.primaryWorkspaces[target.key] = value;
      break;
    case 'otherWorkspaces':
      template.otherWorkspaces[target.key] = value;
      break;
  }
}

function describeCell(value: Cell): string {
  return isBlank(value) ? 'None' : `'${cellText(value)}'`;
}

/** Parse one role template from its sheet; rows are read from the top, two cells wide */
export function parseRoleTemplate(sheet: Sheet): RoleTemplate {
  const template = seedRoleTemplate('');
  const fail = (message: string, detail: string): never => {
    throw new TemplateDefinitionError(sheet.name, message, detail);
  };
  const readFailure = `Failed to read '${sheet.name}' role template definition`;
  const invalidDefinition = `Invalid role template definition in '${sheet.name}' sheet`;

  let declaredName: string | undefined;
  let category: { name: string; permissions: ReadonlyMap<string, PermissionTarget> } | undefined;

  for (const row of sheet.rows) {
    const first = row[0] ?? null;
    const second = row[1] ?? null;
    const label = cellText(first);
    const value = cellText(second);

    if (label === NAME_LABEL) {
      if (!value) {
        fail(readFailure, "Invalid 'Name' specification, value must be provided");
      }
      declaredName = value;
    } else if (label && !value) {
      const permissions = PERMISSION_CATEGORIES.get(label);
      if (!permissions) {
        fail(readFailure, `Invalid permission category '${label}'`);
      } else {
        category = { name: label, permissions };
      }
    } else if (label && value) {
      if (!category) {
        fail(
          readFailure,
          `Invalid attempt to specify permission '${label}' (value '${value}') outside of a category`
        );
      } else {
        const target = category.permissions.get(label);
        if (!target) {
          fail(
            readFailure,
            `Invalid permission '${label}' (value '${value}') in category '${category.name}'`
          );
        } else {
          grant(template, target, isYes(second));
        }
      }
    } else if (value) {
      fail(invalidDefinition, `Invalid row contents (${describeCell(first)}, ${describeCell(second)})`);
    }
  }

  if (!declaredName) {
    return fail(invalidDefinition, 'Role template name must be specified');
  }
  if (declaredName !== sheet.name) {
    fail(invalidDefinition, `Sheet name does not match role template name '${declaredName}' specified`);
  }
  template.name = declaredName;
  return template;
}

/** Read every sheet of the roles workbook as a role template */
export function loadRoleTemplates(workbook: Workbook): Map<string, RoleTemplate> {
  const templates = new Map<string, RoleTemplate>();
  for (const sheetName of workbook.sheetNames()) {
    const sheet = workbook.sheet(sheetName);
    if (!sheet) continue;

    const template = parseRoleTemplate(sheet);
    if (templates.has(template.name)) {
      throw new TemplateDefinitionError(
        sheet.name,
        `Invalid role template definition in '${sheet.name}' sheet`,
        `Role template with name '${template.name}' already defined`
      );
    }
    templates.set(template.name, template);
  }
  return templates;
}
