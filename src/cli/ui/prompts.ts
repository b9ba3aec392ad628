import { confirm } from '@inquirer/prompts';

import { getActiveCancelSignal } from '../cancel.js';

export async function promptConfirm(opts: { message: string; default?: boolean }): Promise<boolean> {
  const signal = getActiveCancelSignal();
  return await confirm(opts, signal ? { signal } : {});
}
