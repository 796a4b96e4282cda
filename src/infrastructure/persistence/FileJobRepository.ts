import fs from 'fs';
import path from 'path';
import { RenderJob, RenderJobStatus, emptyStatusCounts } from '../../domain/entities/RenderJob';
import { StaleJobVersionError } from '../../domain/errors/CompositionErrors';
import { IJobRepository, JobListFilter } from '../../domain/ports/IJobRepository';

/**
 * Job repository with file-based persistence.
 * Ensures jobs survive restarts during long renders. Without a path the
 * jobs live in memory only.
 */
export class FileJobRepository implements IJobRepository {
    private jobs: Map<string, RenderJob> = new Map();
    private readonly persistencePath: string | null;

    constructor(persistencePath?: string) {
        this.persistencePath = persistencePath ? path.resolve(persistencePath) : null;
        if (this.persistencePath) {
            this.ensureDataDir(this.persistencePath);
            this.loadFromDisk(this.persistencePath);
        }
    }

    async create(job: RenderJob): Promise<RenderJob> {
        if (this.jobs.has(job.id)) {
            throw new Error(`Job ${job.id} already exists`);
        }
        const stored = clone(job);
        this.jobs.set(job.id, stored);
        this.saveToDisk();
        return clone(stored);
    }

    async get(id: string): Promise<RenderJob | null> {
        const job = this.jobs.get(id);
        return job ? clone(job) : null;
    }

    async update(job: RenderJob): Promise<RenderJob> {
        const current = this.jobs.get(job.id);
        if (!current) {
            throw new Error(`Job ${job.id} does not exist`);
        }
        if (current.version !== job.version) {
            throw new StaleJobVersionError(job.id, job.version, current.version);
        }
        const stored = clone({ ...job, version: job.version + 1 });
        this.jobs.set(job.id, stored);
        this.saveToDisk();
        return clone(stored);
    }

    async list(filter: JobListFilter = {}): Promise<RenderJob[]> {
        // Reversed first so jobs created in the same millisecond still list newest first
        const matching = Array.from(this.jobs.values())
            .reverse()
            .filter((job) => !filter.ownerId || job.ownerId === filter.ownerId)
            .filter((job) => !filter.status || job.status === filter.status)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
        const offset = filter.offset ?? 0;
        const end = filter.limit === undefined ? undefined : offset + filter.limit;
        return matching.slice(offset, end).map(clone);
    }

    async countByStatus(ownerId?: string): Promise<Record<RenderJobStatus, number>> {
        const counts = emptyStatusCounts();
        for (const job of this.jobs.values()) {
            if (!ownerId || job.ownerId === ownerId) {
                counts[job.status]++;
            }
        }
        return counts;
    }

    private ensureDataDir(filePath: string) {
        const dir = path.dirname(filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    private loadFromDisk(filePath: string) {
        if (!fs.existsSync(filePath)) {
            return;
        }
        try {
            const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'), reviveDates);
            if (!isJobRecord(parsed)) {
                throw new Error('expected an object of jobs keyed by id');
            }
            Object.entries(parsed).forEach(([id, job]) => this.jobs.set(id, job));
            console.log(`[JobStore] Loaded ${this.jobs.size} jobs from disk`);
        } catch (error) {
            console.error('[JobStore] Failed to load jobs from disk:', error);
        }
    }

    private saveToDisk() {
        if (!this.persistencePath) {
            return;
        }
        // Atomic replace
        const tempPath = `${this.persistencePath}.tmp`;
        fs.writeFileSync(tempPath, JSON.stringify(Object.fromEntries(this.jobs), null, 2));
        fs.renameSync(tempPath, this.persistencePath);
    }
}

const DATE_FIELDS = new Set(['createdAt', 'updatedAt', 'startedAt', 'completedAt', 'at']);

/**
 * Converts date strings back to Date objects.
 */
function reviveDates(key: string, value: unknown): unknown {
    if (DATE_FIELDS.has(key) && typeof value === 'string') {
        return new Date(value);
    }
    return value;
}

function isJobRecord(value: unknown): value is Record<string, RenderJob> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Stored jobs are never handed out by reference
function clone(job: RenderJob): RenderJob {
    return structuredClone(job);
}
