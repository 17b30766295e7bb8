/**
 * Pipeline context validation and trigger detection.
 *
 * Hosts build a PipelineContext from their own environment; this module
 * checks its shape and maps the host's event name onto a TriggerType.
 *
 * @module context
 */

import { z } from 'zod';
import { InvocationError } from '../errors/InputErrors.js';
import { TriggerType, type JsonValue, type PipelineContext } from '../types/core-types.js';

/**
 * Event names by trigger type. Anything unlisted is `other`.
 */
export const TRIGGER_EVENTS: Readonly<Record<string, TriggerType>> = {
  pull_request: TriggerType.PULL_REQUEST,
  pull_request_target: TriggerType.PULL_REQUEST,
  pull_request_review: TriggerType.PULL_REQUEST,
  pull_request_review_comment: TriggerType.PULL_REQUEST,
  issue_comment: TriggerType.COMMENT,
  issues: TriggerType.ISSUE,
  push: TriggerType.PUSH,
  workflow_dispatch: TriggerType.WORKFLOW_DISPATCH,
  workflow_call: TriggerType.WORKFLOW_DISPATCH,
  schedule: TriggerType.SCHEDULE,
};

export function detectTrigger(eventName: string): TriggerType {
  return Object.hasOwn(TRIGGER_EVENTS, eventName) ? TRIGGER_EVENTS[eventName] : TriggerType.OTHER;
}

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const optionalText = z
  .union([z.string(), z.number()])
  .transform(value => String(value))
  .optional();

export const PipelineContextSchema = z.object({
  eventName: z.string().min(1, 'event name is required'),
  payload: z.record(JsonValueSchema),
  ref: optionalText,
  sha: optionalText,
  serverUrl: optionalText,
  repository: optionalText,
  workflow: optionalText,
  actor: optionalText,
  runId: optionalText,
  runNumber: optionalText,
  runAttempt: optionalText,
});

/**
 * Validate a host-built context
 *
 * @throws {InvocationError} If the payload is not a JSON object or a field has the wrong type
 */
export function parsePipelineContext(raw: unknown, source = 'pipeline context'): PipelineContext {
  const parsed = PipelineContextSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw InvocationError.invalidPayload(source, `${where}${issue?.message ?? parsed.error.message}`);
  }

  const context: PipelineContext = { eventName: parsed.data.eventName, payload: parsed.data.payload };
  for (const key of ['ref', 'sha', 'serverUrl', 'repository', 'workflow', 'actor', 'runId', 'runNumber', 'runAttempt'] as const) {
    const value = parsed.data[key];
    if (value !== undefined && value !== '') {
      context[key] = value;
    }
  }
  return context;
}
