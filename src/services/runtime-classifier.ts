import { AutomationDocumentSchema, ExecuteScriptStepSchema } from '../types/document.js';
import type { OutdatedStep } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

const UNNAMED_STEP = 'UnnamedStep';

function mainStepsOf(content: unknown): unknown[] {
  const parsed = AutomationDocumentSchema.safeParse(content);
  return parsed.success ? parsed.data.mainSteps ?? [] : [];
}

function outdatedStepAt(step: unknown, index: number, denylist: readonly string[]): OutdatedStep | null {
  const parsed = ExecuteScriptStepSchema.safeParse(step);
  if (!parsed.success || !denylist.includes(parsed.data.inputs.Runtime)) {
    return null;
  }
  return {
    index,
    name: typeof parsed.data.name === 'string' ? parsed.data.name : UNNAMED_STEP,
    runtime: parsed.data.inputs.Runtime,
  };
}

/**
 * True when any `aws:executeScript` step in the document declares a runtime from
 * `denylist`. Stops at the first such step. Content of any other shape is never
 * outdated.
 */
export function hasOutdatedRuntime(content: unknown, denylist: readonly string[], logger?: Logger): boolean {
  const steps = mainStepsOf(content);

  for (let index = 0; index < steps.length; index++) {
    const match = outdatedStepAt(steps[index], index, denylist);
    if (match) {
      logger?.debug(`Found outdated runtime '${match.runtime}' in step '${match.name}'`);
      return true;
    }
  }

  return false;
}

export function findOutdatedSteps(content: unknown, denylist: readonly string[]): OutdatedStep[] {
  return mainStepsOf(content)
    .map((step, index) => outdatedStepAt(step, index, denylist))
    .filter((step): step is OutdatedStep => step !== null);
}
