/**
 * Option parsers shared by CLI commands
 */

import { InvalidArgumentError } from 'commander';
import { isTaskPayload, type TaskPayload } from '../core/types.js';

const PAYLOAD_ERROR = '--payload must be a JSON object';

/**
 * commander argParser for --payload. The parsed object is kept as-is.
 */
export function parsePayloadOption(value: string): TaskPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError(PAYLOAD_ERROR);
  }

  if (!isTaskPayload(parsed)) {
    throw new InvalidArgumentError(PAYLOAD_ERROR);
  }
  return parsed;
}
