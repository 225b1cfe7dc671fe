import { z } from 'zod';

export const EXECUTE_SCRIPT_ACTION = 'aws:executeScript';

/**
 * Top level of an Automation document. Only `mainSteps` is inspected; every other
 * key is carried through untouched.
 */
export const AutomationDocumentSchema = z
  .object({
    mainSteps: z.array(z.unknown()).optional(),
  })
  .passthrough();


/**
 * An `aws:executeScript` step that declares a runtime. Steps of any other shape
 * fail to parse. `name` is read untyped, since any step may carry one.
 */
export const ExecuteScriptStepSchema = z
  .object({
    action: z.literal(EXECUTE_SCRIPT_ACTION),
    inputs: z
      .object({
        Runtime: z.string(),
      })
      .passthrough(),
  })
  .passthrough();

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
