import { randomBytes } from 'crypto';
import { asRunId, type RunId } from '../models/index.js';

export function generateRunId(now: number = Date.now()): RunId {
  return asRunId(`run_${now.toString(36)}_${randomBytes(4).toString('hex')}`);
}
