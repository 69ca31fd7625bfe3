import { v4 as uuidv4 } from 'uuid';

export function generateRunId(): string {
  return `run-${uuidv4()}`;
}
