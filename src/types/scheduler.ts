export interface JobConfig {
  /** Unique identifier, e.g. 'resync:hectoken'. */
  id: string;
  /** node-cron expression. */
  cronExpression: string;
  handler: () => Promise<void> | void;
}
