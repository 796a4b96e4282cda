import {
    MediaEffects,
    OutputSettings,
    TextOverlay,
    TransitionType,
    VideoSettings,
    VisualMediaType,
} from './CompositionSpec';

export type RenderStageKind =
    | 'scene-render'
    | 'overlay-composite'
    | 'transition-blend'
    | 'audio-mix'
    | 'final-encode';

/**
 * A stage input: a resolved media file or the artifact of an earlier stage.
 */
export type ArtifactRef =
    | { type: 'media'; source: string; path: string }
    | { type: 'stage'; stageId: string };

export interface SceneRenderParams {
    kind: 'scene-render';
    sceneId: string;
    mediaType: VisualMediaType;
    settings: VideoSettings;
    durationSeconds: number;
    trimStartSeconds: number;
    trimEndSeconds: number | null;
    effects: MediaEffects;
}

export interface OverlayCompositeParams {
    kind: 'overlay-composite';
    sceneId: string;
    durationSeconds: number;
    overlays: Array<TextOverlay & { duration: number }>;
}

export interface TransitionBlendParams {
    kind: 'transition-blend';
    fromSceneId: string;
    toSceneId: string;
    type: TransitionType;
    easing: string;
    durationSeconds: number;
    /** Where the blend starts inside the `from` clip */
    fromOffsetSeconds: number;
}

export interface AudioTrack {
    /** Index into the stage's `inputs` */
    input: number;
    role: 'scene' | 'background';
    sceneId: string | null;
    offsetSeconds: number;
    durationSeconds: number;
    volume: number;
    fadeInSeconds: number;
    fadeOutSeconds: number;
    loop: boolean;
}

export interface AudioMixParams {
    kind: 'audio-mix';
    totalDurationSeconds: number;
    tracks: AudioTrack[];
}

/**
 * One piece of the final timeline: a scene clip trimmed around its overlaps, or a blend.
 */
export type TimelineSegment =
    | { type: 'scene'; input: number; sceneId: string; trimStartSeconds: number; trimEndSeconds: number }
    | { type: 'blend'; input: number; durationSeconds: number };

export interface FinalEncodeParams {
    kind: 'final-encode';
    totalDurationSeconds: number;
    segments: TimelineSegment[];
    /** Index into `inputs`, null when there is no audio */
    audioInput: number | null;
    /** Index into `inputs`, null when there is no watermark */
    watermarkInput: number | null;
    settings: VideoSettings;
    output: OutputSettings;
}

export type StageParams =
    | SceneRenderParams
    | OverlayCompositeParams
    | TransitionBlendParams
    | AudioMixParams
    | FinalEncodeParams;

export interface StageFailure {
    kind: string;
    message: string;
    transient: boolean;
    at: Date;
}

export interface RenderStage {
    id: string;
    kind: RenderStageKind;
    inputs: ArtifactRef[];
    /** Artifact file name inside the job's work directory */
    output: string;
    weight: number;
    params: StageParams;
    status: 'pending' | 'completed';
    attempts: number;
    lastError: StageFailure | null;
}

export interface TimelineEntry {
    sceneId: string;
    startSeconds: number;
    durationSeconds: number;
}

export interface PlanWarning {
    code: 'TransitionClipped';
    message: string;
}

export interface RenderPlan {
    stages: RenderStage[];
    timeline: TimelineEntry[];
    totalDurationSeconds: number;
    totalWeight: number;
    warnings: PlanWarning[];
}

/**
 * Progress percentage from completed stage weights.
 */
export function computePlanProgress(plan: RenderPlan): number {
    if (plan.totalWeight <= 0) {
        return 0;
    }
    const done = plan.stages
        .filter((stage) => stage.status === 'completed')
        .reduce((sum, stage) => sum + stage.weight, 0);
    return Math.min(100, Math.round((done / plan.totalWeight) * 10000) / 100);
}

export function countStages(plan: RenderPlan, kind: RenderStageKind): number {
    return plan.stages.filter((stage) => stage.kind === kind).length;
}

export function getFinalStage(plan: RenderPlan): RenderStage {
    const last = plan.stages[plan.stages.length - 1];
    if (!last || last.kind !== 'final-encode') {
        throw new Error('Render plan does not end with a final-encode stage');
    }
    return last;
}
