import { CompositionSpec } from '../domain/entities/CompositionSpec';
import { ResolvedMediaSet } from '../domain/entities/MediaAsset';
import { RenderPlan } from '../domain/entities/RenderPlan';
import { effectiveMediaDuration, validateComposition } from '../domain/services/CompositionValidator';
import { compileTimeline, estimateProcessingSeconds } from '../domain/services/TimelineCompiler';
import { MediaReferenceResolver } from './MediaReferenceResolver';

export interface PlannerOptions {
    defaultSceneDurationSeconds: number;
    timePrecisionDigits: number;
}

export interface CompositionPlan {
    spec: CompositionSpec;
    plan: RenderPlan;
    media: ResolvedMediaSet;
    estimatedSeconds: number;
}

/**
 * Validate -> resolve -> validate again with media durations -> compile.
 *
 * The first pass rejects structural problems before any download happens.
 * Video scenes without an explicit duration only get their overlay bounds
 * checked in the second pass, once the media has been probed.
 */
export class CompositionPlanner {
    private readonly resolver: MediaReferenceResolver;
    private readonly options: PlannerOptions;

    constructor(resolver: MediaReferenceResolver, options: PlannerOptions) {
        this.resolver = resolver;
        this.options = options;
    }

    async plan(raw: unknown): Promise<CompositionPlan> {
        const defaultSceneDurationSeconds = this.options.defaultSceneDurationSeconds;
        const draft = validateComposition(raw, { defaultSceneDurationSeconds });
        const media = await this.resolver.resolveAll(draft);

        const mediaDurations = new Map<string, number>();
        for (const scene of draft.scenes) {
            const probed = media.get(scene.media.source)?.durationSeconds;
            if (scene.duration === null && probed !== undefined && probed !== null) {
                mediaDurations.set(scene.id, effectiveMediaDuration(scene.media, probed));
            }
        }

        const spec = validateComposition(raw, { defaultSceneDurationSeconds, mediaDurations });
        const plan = compileTimeline(spec, media, this.options);

        return {
            spec,
            plan,
            media,
            estimatedSeconds: estimateProcessingSeconds(spec),
        };
    }
}
