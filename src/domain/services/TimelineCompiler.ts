import { CompositionSpec, Quality, Scene, Transition } from '../entities/CompositionSpec';
import { ResolvedMedia, ResolvedMediaSet } from '../entities/MediaAsset';
import {
    ArtifactRef,
    AudioTrack,
    PlanWarning,
    RenderPlan,
    RenderStage,
    RenderStageKind,
    StageParams,
    TimelineEntry,
    TimelineSegment,
} from '../entities/RenderPlan';
import { ResolutionError, SpecError } from '../errors/CompositionErrors';
import { effectiveMediaDuration } from './CompositionValidator';

export interface CompilerOptions {
    defaultSceneDurationSeconds: number;
    /** Timeline arithmetic is exact to 10^-digits seconds */
    timePrecisionDigits: number;
}

const MIN_STAGE_WEIGHT = 0.1;

const ENCODE_WEIGHT_FACTOR: Record<Quality, number> = {
    low: 0.35,
    medium: 0.5,
    high: 0.75,
};

const ESTIMATE_QUALITY_MULTIPLIER: Record<Quality, number> = {
    low: 0.7,
    medium: 1.0,
    high: 1.5,
};

/**
 * Compiles a validated composition into an ordered render plan.
 * Nothing is executed here; the plan only describes the work.
 */
export function compileTimeline(
    spec: CompositionSpec,
    media: ResolvedMediaSet,
    options: CompilerOptions
): RenderPlan {
    const clock = new TickClock(options.timePrecisionDigits);
    const scenes = spec.scenes;
    const warnings: PlanWarning[] = [];

    const durations = scenes.map((scene) =>
        clock.toTicks(sceneDuration(scene, media, options.defaultSceneDurationSeconds))
    );

    // overlaps[i] is the clipped transition joining scene i-1 to scene i (0 for a cut)
    const transitionsInto = new Map(spec.transitions.map((t): [string, Transition] => [t.to_scene, t]));
    const overlaps = scenes.map((scene, i) => {
        const transition = transitionsInto.get(scene.id);
        if (i === 0 || !transition) {
            return 0;
        }
        const requested = clock.toTicks(transition.duration);
        const clipped = Math.min(requested, durations[i - 1], durations[i]);
        if (clipped < requested) {
            warnings.push({
                code: 'TransitionClipped',
                message: `Transition ${transition.from_scene} -> ${transition.to_scene} shortened from ` +
                    `${transition.duration}s to ${clock.toSeconds(clipped)}s to fit the adjacent scenes`,
            });
        }
        return clipped;
    });

    scenes.forEach((scene, i) => {
        const consumed = overlaps[i] + (overlaps[i + 1] ?? 0);
        if (consumed > durations[i]) {
            throw new SpecError(
                'NegativeTimelineDuration',
                `Transitions around scene "${scene.id}" overlap ${clock.toSeconds(consumed)}s ` +
                    `but the scene only lasts ${clock.toSeconds(durations[i])}s`
            );
        }
    });

    const totalTicks = durations.reduce((sum, d) => sum + d, 0) - overlaps.reduce((sum, o) => sum + o, 0);
    if (totalTicks <= 0) {
        throw new SpecError('NegativeTimelineDuration', 'Transitions consume the whole timeline');
    }
    const totalSeconds = clock.toSeconds(totalTicks);

    const timeline: TimelineEntry[] = [];
    let cursor = 0;
    scenes.forEach((scene, i) => {
        cursor -= overlaps[i];
        timeline.push({
            sceneId: scene.id,
            startSeconds: clock.toSeconds(cursor),
            durationSeconds: clock.toSeconds(durations[i]),
        });
        cursor += durations[i];
    });

    const stages: RenderStage[] = [];
    const clipStageIds: string[] = [];
    const blendStageIds = new Map<number, string>();

    scenes.forEach((scene, i) => {
        const seconds = clock.toSeconds(durations[i]);
        const sceneStageId = `scene-${i}`;
        stages.push(createStage(sceneStageId, 'scene-render', [mediaInput(media, scene.media.source)], 'mp4', seconds, {
            kind: 'scene-render',
            sceneId: scene.id,
            mediaType: scene.media.type,
            settings: spec.settings,
            durationSeconds: seconds,
            trimStartSeconds: scene.media.start_time,
            trimEndSeconds: scene.media.end_time,
            effects: scene.media.effects,
        }));
        let clipId = sceneStageId;

        if (scene.text_overlays.length > 0) {
            clipId = `overlay-${i}`;
            stages.push(createStage(clipId, 'overlay-composite', [stageInput(sceneStageId)], 'mp4', seconds * 0.25, {
                kind: 'overlay-composite',
                sceneId: scene.id,
                durationSeconds: seconds,
                overlays: scene.text_overlays.map((overlay) => ({
                    ...overlay,
                    duration: overlay.duration ?? clock.toSeconds(durations[i] - clock.toTicks(overlay.start_time)),
                })),
            }));
        }
        clipStageIds.push(clipId);

        const transition = transitionsInto.get(scene.id);
        if (i > 0 && transition) {
            const blendId = `blend-${i - 1}-${i}`;
            const blendSeconds = clock.toSeconds(overlaps[i]);
            blendStageIds.set(i, blendId);
            stages.push(createStage(
                blendId,
                'transition-blend',
                [stageInput(clipStageIds[i - 1]), stageInput(clipId)],
                'mp4',
                blendSeconds,
                {
                    kind: 'transition-blend',
                    fromSceneId: transition.from_scene,
                    toSceneId: transition.to_scene,
                    type: transition.type,
                    easing: transition.easing,
                    durationSeconds: blendSeconds,
                    fromOffsetSeconds: clock.toSeconds(durations[i - 1] - overlaps[i]),
                }
            ));
        }
    });

    const audioStage = buildAudioMix(spec, media, timeline, totalSeconds);
    if (audioStage) {
        stages.push(audioStage);
    }

    const finalInputs: ArtifactRef[] = [];
    const segments: TimelineSegment[] = [];
    scenes.forEach((scene, i) => {
        const blendId = blendStageIds.get(i);
        if (blendId) {
            finalInputs.push(stageInput(blendId));
            segments.push({ type: 'blend', input: finalInputs.length - 1, durationSeconds: clock.toSeconds(overlaps[i]) });
        }
        const trimStart = overlaps[i];
        const trimEnd = durations[i] - (overlaps[i + 1] ?? 0);
        if (trimEnd > trimStart) {
            finalInputs.push(stageInput(clipStageIds[i]));
            segments.push({
                type: 'scene',
                input: finalInputs.length - 1,
                sceneId: scene.id,
                trimStartSeconds: clock.toSeconds(trimStart),
                trimEndSeconds: clock.toSeconds(trimEnd),
            });
        }
    });

    let audioInput: number | null = null;
    if (audioStage) {
        finalInputs.push(stageInput(audioStage.id));
        audioInput = finalInputs.length - 1;
    }
    let watermarkInput: number | null = null;
    if (spec.watermark) {
        finalInputs.push(mediaInput(media, spec.watermark));
        watermarkInput = finalInputs.length - 1;
    }

    stages.push(createStage(
        'final-encode',
        'final-encode',
        finalInputs,
        spec.output.format,
        totalSeconds * ENCODE_WEIGHT_FACTOR[spec.settings.quality],
        {
            kind: 'final-encode',
            totalDurationSeconds: totalSeconds,
            segments,
            audioInput,
            watermarkInput,
            settings: spec.settings,
            output: spec.output,
        }
    ));

    return {
        stages,
        timeline,
        totalDurationSeconds: totalSeconds,
        totalWeight: roundWeight(stages.reduce((sum, stage) => sum + stage.weight, 0)),
        warnings,
    };
}

/**
 * Rough wall-clock estimate shown to the submitter.
 */
export function estimateProcessingSeconds(spec: CompositionSpec): number {
    const overlayCount = spec.scenes.reduce((sum, scene) => sum + scene.text_overlays.length, 0);
    const base = 30
        + spec.scenes.length * 15
        + spec.transitions.length * 5
        + overlayCount * 3
        + (spec.global_audio.background_music ? 10 : 0);
    return Math.floor(base * ESTIMATE_QUALITY_MULTIPLIER[spec.settings.quality]);
}

function sceneDuration(scene: Scene, media: ResolvedMediaSet, fallback: number): number {
    if (scene.duration !== null) {
        return scene.duration;
    }
    const probed = media.get(scene.media.source)?.durationSeconds;
    if (probed !== undefined && probed !== null) {
        return effectiveMediaDuration(scene.media, probed);
    }
    return fallback;
}

function buildAudioMix(
    spec: CompositionSpec,
    media: ResolvedMediaSet,
    timeline: TimelineEntry[],
    totalSeconds: number
): RenderStage | null {
    const inputs: ArtifactRef[] = [];
    const tracks: AudioTrack[] = [];

    spec.scenes.forEach((scene, i) => {
        if (!scene.audio) {
            return;
        }
        inputs.push(mediaInput(media, scene.audio.source));
        tracks.push({
            input: inputs.length - 1,
            role: 'scene',
            sceneId: scene.id,
            offsetSeconds: timeline[i].startSeconds,
            durationSeconds: timeline[i].durationSeconds,
            volume: scene.audio.volume,
            fadeInSeconds: scene.audio.fade_in,
            fadeOutSeconds: scene.audio.fade_out,
            loop: scene.audio.loop,
        });
    });

    const music = spec.global_audio.background_music;
    if (music) {
        inputs.push(mediaInput(media, music.source));
        tracks.push({
            input: inputs.length - 1,
            role: 'background',
            sceneId: null,
            offsetSeconds: 0,
            durationSeconds: totalSeconds,
            volume: music.volume,
            fadeInSeconds: music.fade_in,
            fadeOutSeconds: music.fade_out,
            loop: music.loop,
        });
    }

    if (tracks.length === 0) {
        return null;
    }
    return createStage('audio-mix', 'audio-mix', inputs, 'm4a', totalSeconds * 0.1 + 1, {
        kind: 'audio-mix',
        totalDurationSeconds: totalSeconds,
        tracks,
    });
}

function createStage(
    id: string,
    kind: RenderStageKind,
    inputs: ArtifactRef[],
    extension: string,
    weight: number,
    params: StageParams
): RenderStage {
    return {
        id,
        kind,
        inputs,
        output: `${id}.${extension}`,
        weight: roundWeight(Math.max(MIN_STAGE_WEIGHT, weight)),
        params,
        status: 'pending',
        attempts: 0,
        lastError: null,
    };
}

function mediaInput(media: ResolvedMediaSet, source: string): ArtifactRef {
    const resolved: ResolvedMedia | undefined = media.get(source);
    if (!resolved) {
        throw new ResolutionError('NotFound', `Media source ${source} was not resolved`, source);
    }
    return { type: 'media', source, path: resolved.path };
}

function stageInput(stageId: string): ArtifactRef {
    return { type: 'stage', stageId };
}

function roundWeight(weight: number): number {
    return Math.round(weight * 1000) / 1000;
}

/**
 * Integer time base so sums and differences of durations stay exact.
 */
class TickClock {
    private readonly scale: number;

    constructor(digits: number) {
        this.scale = 10 ** digits;
    }

    toTicks(seconds: number): number {
        return Math.round(seconds * this.scale);
    }

    toSeconds(ticks: number): number {
        return ticks / this.scale;
    }
}
