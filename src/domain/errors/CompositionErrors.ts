/**
 * Error taxonomy for the composition service.
 * Every error that reaches a caller or a job record carries a stable `kind`.
 */
export type ErrorCategory = 'spec' | 'resolution' | 'stage' | 'concurrency' | 'access';

export type SpecErrorKind =
    | 'MalformedSpec'
    | 'DuplicateSceneId'
    | 'UnknownSceneReference'
    | 'InvalidTransitionTopology'
    | 'OverlayOutOfBounds'
    | 'NegativeTimelineDuration';

export type ResolutionErrorKind =
    | 'NotFound'
    | 'UnreachableSource'
    | 'SizeLimitExceeded'
    | 'DomainNotAllowed'
    | 'MediaTypeMismatch'
    | 'UnreadableMedia';

export type TransientStageErrorKind = 'EngineTimeout' | 'TransientIO';
export type PermanentStageErrorKind = 'MalformedInput' | 'EncodeRejected';
export type StageErrorKind = TransientStageErrorKind | PermanentStageErrorKind;

export type JobAccessErrorKind =
    | 'JobNotFound'
    | 'Forbidden'
    | 'InvalidStateForCancel'
    | 'NotReady'
    | 'ArtifactNotFound';

/**
 * Base class of all domain errors.
 */
export abstract class CompositionServiceError extends Error {
    abstract readonly category: ErrorCategory;
    abstract readonly kind: string;
}

/**
 * Invalid user input, raised synchronously at submission. No job is created.
 */
export class SpecError extends CompositionServiceError {
    readonly category = 'spec';

    constructor(
        public readonly kind: SpecErrorKind,
        message: string,
        public readonly details?: unknown
    ) {
        super(message);
        this.name = 'SpecError';
    }
}

/**
 * A media source could not be turned into a local, validated file.
 */
export class ResolutionError extends CompositionServiceError {
    readonly category = 'resolution';

    constructor(
        public readonly kind: ResolutionErrorKind,
        message: string,
        public readonly source?: string
    ) {
        super(message);
        this.name = 'ResolutionError';
    }
}

const TRANSIENT_STAGE_KINDS: ReadonlySet<StageErrorKind> = new Set(['EngineTimeout', 'TransientIO']);

/**
 * Failure reported by the render engine for a single stage.
 */
export class StageError extends CompositionServiceError {
    readonly category = 'stage';

    constructor(
        public readonly kind: StageErrorKind,
        message: string
    ) {
        super(message);
        this.name = 'StageError';
    }

    get transient(): boolean {
        return TRANSIENT_STAGE_KINDS.has(this.kind);
    }
}

/**
 * Optimistic-lock conflict on a job record. Handled by the writer, never shown to end callers.
 */
export class StaleJobVersionError extends CompositionServiceError {
    readonly category = 'concurrency';
    readonly kind = 'StaleJobVersion';

    constructor(
        public readonly jobId: string,
        public readonly expectedVersion: number,
        public readonly actualVersion: number
    ) {
        super(`Job ${jobId} is at version ${actualVersion}, expected ${expectedVersion}`);
        this.name = 'StaleJobVersionError';
    }
}

export class JobAccessError extends CompositionServiceError {
    readonly category = 'access';

    constructor(
        public readonly kind: JobAccessErrorKind,
        message: string
    ) {
        super(message);
        this.name = 'JobAccessError';
    }
}

/**
 * Reduces any thrown value to the `{kind, message}` pair stored on a failed job.
 */
export function describeError(error: unknown): { kind: string; message: string } {
    if (error instanceof CompositionServiceError) {
        return { kind: error.kind, message: error.message };
    }
    if (error instanceof Error) {
        return { kind: 'InternalError', message: error.message };
    }
    return { kind: 'InternalError', message: String(error) };
}
