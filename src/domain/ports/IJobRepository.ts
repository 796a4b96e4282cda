import { RenderJob, RenderJobStatus } from '../entities/RenderJob';

export interface JobListFilter {
    ownerId?: string;
    status?: RenderJobStatus;
    limit?: number;
    offset?: number;
}

/**
 * IJobRepository - Port for job persistence with optimistic versioning.
 */
export interface IJobRepository {
    create(job: RenderJob): Promise<RenderJob>;

    get(id: string): Promise<RenderJob | null>;

    /**
     * Writes `job` if the stored version still equals `job.version`.
     * @returns The stored job with its version incremented
     * @throws StaleJobVersionError when another writer got there first
     */
    update(job: RenderJob): Promise<RenderJob>;

    /** Newest first */
    list(filter?: JobListFilter): Promise<RenderJob[]>;

    countByStatus(ownerId?: string): Promise<Record<RenderJobStatus, number>>;
}
