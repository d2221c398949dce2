import prompts from 'prompts';
import type { ApprovalGate } from './types.js';

/** Interactive yes/no question; answering with Enter approves */
export class PromptApprovalGate implements ApprovalGate {
  async confirm(question: string): Promise<boolean> {
    const response = await prompts({
      type: 'confirm',
      name: 'proceed',
      message: question,
      initial: true,
    });
    // Ctrl+C leaves the answer unset
    return response.proceed === true;
  }
}

/** Approves every phase without asking (`--yes`) */
export class AutoApproveGate implements ApprovalGate {
  async confirm(): Promise<boolean> {
    return true;
  }
}
