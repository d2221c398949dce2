/**
 * Static permission catalog.
 *
 * Role sheets grant permissions by human label under a category header. Each
 * category writes to one scope of a role template: organization-wide flags,
 * flags for the role's primary workspaces, or flags for every other workspace.
 */

export const WORKSPACE_PERMISSION_LABELS = {
  'Read Patients': 'read_patients',
  'Manage Patient Access': 'manage_access_patients',
  'View PHI': 'view_phi',
  'Download DICOM': 'download_dicom',
  'Upload DICOM': 'upload_dicom',
  'Write Patients': 'write_patients',
  'Contour Patients': 'contour_patients',
  'Delete Patients': 'delete_patients',
  'Read Collections': 'read_collections',
  'Write Collections': 'write_collections',
  'Delete Collections': 'delete_collections',
  'Collaborator': 'collaborator',
} as const;

export const ADVANCED_PERMISSION_LABELS = {
  'Create API Keys': 'create_api_keys',
} as const;

export const MANAGEMENT_PERMISSION_LABELS = {
  'Manage Users, Roles, and Workspaces': 'manage_access',
  'Manage Custom Metrics': 'manage_custom_metrics',
  // Each label maps to the flag it names. Roles stored with these two flags
  // swapped are rewritten once, as an update.
  'Manage Renaming Rules': 'manage_renaming_rules',
  'Manage Scorecard Templates': 'manage_template_metric_sets',
  'Manage Checklist Templates': 'manage_template_checklists',
  'Manage Structure Set Templates': 'manage_template_structure_sets',
  'Manage Workspace Algorithms': 'manage_workspace_algorithms',
} as const;

export type WorkspacePermissionKey =
  (typeof WORKSPACE_PERMISSION_LABELS)[keyof typeof WORKSPACE_PERMISSION_LABELS];

export type OrganizationPermissionKey =
  | (typeof ADVANCED_PERMISSION_LABELS)[keyof typeof ADVANCED_PERMISSION_LABELS]
  | (typeof MANAGEMENT_PERMISSION_LABELS)[keyof typeof MANAGEMENT_PERMISSION_LABELS]
  | `organization_${WorkspacePermissionKey}`;

export type WorkspacePermissions = Record<WorkspacePermissionKey, boolean>;
export type OrganizationPermissions = Record<OrganizationPermissionKey, boolean>;

export type PermissionTarget =
  | { scope: 'organization'; key: OrganizationPermissionKey }
  | { scope: 'primaryWorkspaces' | 'otherWorkspaces'; key: WorkspacePermissionKey };

export const WORKSPACE_PERMISSION_KEYS: readonly WorkspacePermissionKey[] = Object.freeze(
  Object.values(WORKSPACE_PERMISSION_LABELS)
);

export const ORGANIZATION_PERMISSION_KEYS: readonly OrganizationPermissionKey[] = Object.freeze([
  ...Object.values(ADVANCED_PERMISSION_LABELS),
  ...Object.values(MANAGEMENT_PERMISSION_LABELS),
  ...WORKSPACE_PERMISSION_KEYS.map(key => `organization_${key}` as const),
]);

function labelTable<V>(labels: Record<string, V>, toTarget: (value: V) => PermissionTarget) {
  return new Map(
    Object.entries(labels).map(([label, value]): [string, PermissionTarget] => [label, toTarget(value)])
  );
}

/** Category header → (permission label → target) */
export const PERMISSION_CATEGORIES: ReadonlyMap<string, ReadonlyMap<string, PermissionTarget>> = new Map([
  ['Advanced User Permissions', labelTable(ADVANCED_PERMISSION_LABELS, key => ({ scope: 'organization', key }))],
  ['Organization Management Permissions', labelTable(MANAGEMENT_PERMISSION_LABELS, key => ({ scope: 'organization', key }))],
  ['All Workspaces', labelTable(WORKSPACE_PERMISSION_LABELS, key => ({ scope: 'organization', key: `organization_${key}` as const }))],
  ['Primary Workspaces', labelTable(WORKSPACE_PERMISSION_LABELS, key => ({ scope: 'primaryWorkspaces', key }))],
  ['Other Workspaces', labelTable(WORKSPACE_PERMISSION_LABELS, key => ({ scope: 'otherWorkspaces', key }))],
]);

export function emptyWorkspacePermissions(): WorkspacePermissions {
  return {
    read_patients: false,
    manage_access_patients: false,
    view_phi: false,
    download_dicom: false,
    upload_dicom: false,
    write_patients: false,
    contour_patients: false,
    delete_patients: false,
    read_collections: false,
    write_collections: false,
    delete_collections: false,
    collaborator: false,
  };
}

export function emptyOrganizationPermissions(): OrganizationPermissions {
  return {
    create_api_keys: false,
    manage_access: false,
    manage_custom_metrics: false,
    manage_renaming_rules: false,
    manage_template_metric_sets: false,
    manage_template_checklists: false,
    manage_template_structure_sets: false,
    manage_workspace_algorithms: false,
    organization_read_patients: false,
    organization_manage_access_patients: false,
    organization_view_phi: false,
    organization_download_dicom: false,
    organization_upload_dicom: false,
    organization_write_patients: false,
    organization_contour_patients: false,
    organization_delete_patients: false,
    organization_read_collections: false,
    organization_write_collections: false,
    organization_delete_collections: false,
    organization_collaborator: false,
  };
}
