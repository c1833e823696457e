/** Status of a registered scheduled job. */
export type JobStatus = 'idle' | 'running' | 'stopped' | 'error';

/** Configuration required to register a repeating job. */
export interface JobConfig {
    /** Unique identifier for this job (e.g. 'media-temp-sweep'). */
    id: string;
    /** A cron expression defining the schedule (node-cron format). */
    cronExpression: string;
    description: string;
    handler: () => Promise<void> | void;
    /**
     * If true, the job is scheduled immediately upon registration.
     * @default true
     */
    autoStart?: boolean;
}

/** Read-only snapshot of a registered job's state. */
export interface JobSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
}
