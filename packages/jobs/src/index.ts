/**
 * @inkline/jobs — background runs with a polled, expiring job record.
 */

export { JobStore, isFinished, DEFAULT_TTL_HOURS } from './job-store.js';
export type { JobRecord, JobStoreOptions } from './job-store.js';

export {
  JobRunner,
  progressFor,
  jobStatusFor,
  PROGRESS_STARTED,
  PROGRESS_CEILING,
  PROGRESS_DONE,
} from './job-runner.js';
export type { JobRunnerOptions, CancelOutcome } from './job-runner.js';
