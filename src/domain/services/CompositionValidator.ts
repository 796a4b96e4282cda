import Ajv from 'ajv';
import compositionSchema from './composition.schema.json';
import {
    AudioRef,
    CompositionSpec,
    MediaRef,
    RawAudioRef,
    RawCompositionSpec,
    RawMediaRef,
    RawScene,
    RawTextOverlay,
    RawTransition,
    Scene,
    TextOverlay,
    Transition,
} from '../entities/CompositionSpec';
import { SpecError } from '../errors/CompositionErrors';

/**
 * Values applied to every field the submitter left out or set to null.
 */
export const COMPOSITION_DEFAULTS = {
    settings: { width: 1920, height: 1080, fps: 30, quality: 'medium' as const },
    output: { format: 'mp4' as const, codec: 'h264' },
    transition: { duration: 0.5, easing: 'linear' },
    sceneAudio: { volume: 1.0, fadeIn: 0, fadeOut: 0, loop: false },
    backgroundMusic: { volume: 0.3, fadeIn: 0, fadeOut: 0, loop: true },
    overlay: { fontSize: 24, color: '#FFFFFF', startTime: 0 },
    effects: { zoom: 1, pan: 'none' as const, rotation: 0, speed: 1, brightness: 1 },
};

export interface ValidationOptions {
    /** Used for scenes with neither an explicit duration nor a known media duration */
    defaultSceneDurationSeconds: number;
    /** Playable media length per scene id, once the media has been resolved */
    mediaDurations?: ReadonlyMap<string, number>;
}

const EPSILON = 1e-9;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateShape = ajv.compile<RawCompositionSpec>(compositionSchema);

/**
 * Validates a submitted composition and fills every omitted field.
 *
 * Pure: the input is never mutated and the result depends only on the
 * arguments. Checks run in a fixed order so the first failing rule decides
 * the error kind. Feeding the result back in returns an equal spec.
 */
export function validateComposition(raw: unknown, options: ValidationOptions): CompositionSpec {
    const input = checkShape(raw);
    const transitions = input.transitions ?? [];

    checkUniqueSceneIds(input.scenes);
    checkTransitionEndpoints(input.scenes, transitions);
    checkTransitionTopology(input.scenes, transitions);

    const durations = new Map<string, number | null>();
    for (const scene of input.scenes) {
        durations.set(scene.id, inferSceneDuration(scene, options));
    }
    checkOverlayBounds(input.scenes, durations);

    return {
        title: input.title,
        settings: {
            width: input.settings?.width ?? COMPOSITION_DEFAULTS.settings.width,
            height: input.settings?.height ?? COMPOSITION_DEFAULTS.settings.height,
            fps: input.settings?.fps ?? COMPOSITION_DEFAULTS.settings.fps,
            quality: input.settings?.quality ?? COMPOSITION_DEFAULTS.settings.quality,
        },
        output: {
            format: input.output?.format ?? COMPOSITION_DEFAULTS.output.format,
            codec: input.output?.codec ?? COMPOSITION_DEFAULTS.output.codec,
        },
        scenes: input.scenes.map((scene) => fillScene(scene, durations.get(scene.id) ?? null)),
        transitions: transitions.map(fillTransition),
        global_audio: {
            background_music: input.global_audio?.background_music
                ? fillAudio(input.global_audio.background_music, COMPOSITION_DEFAULTS.backgroundMusic)
                : null,
        },
        watermark: input.watermark ?? null,
    };
}

/**
 * Playable length of a scene's media: the trimmed range at the requested speed.
 */
export function effectiveMediaDuration(media: MediaRef, probedSeconds: number): number {
    const end = media.end_time === null ? probedSeconds : Math.min(media.end_time, probedSeconds);
    const length = end - media.start_time;
    if (length <= EPSILON) {
        throw new SpecError(
            'MalformedSpec',
            `Trim range ${media.start_time}s-${end}s of ${media.source} is empty (media is ${probedSeconds}s long)`
        );
    }
    return roundSeconds(length / media.effects.speed);
}

function checkShape(raw: unknown): RawCompositionSpec {
    if (!validateShape(raw)) {
        const problems = (validateShape.errors ?? []).map(
            (error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`
        );
        throw new SpecError('MalformedSpec', `Composition is malformed: ${problems.join('; ')}`, problems);
    }

    for (const scene of raw.scenes) {
        const { start_time: start, end_time: end } = scene.media;
        if (end !== undefined && end !== null && end <= (start ?? 0) + EPSILON) {
            throw new SpecError(
                'MalformedSpec',
                `Scene "${scene.id}": media end_time must be greater than start_time`
            );
        }
    }
    return raw;
}

function checkUniqueSceneIds(scenes: RawScene[]): void {
    const seen = new Set<string>();
    for (const scene of scenes) {
        if (seen.has(scene.id)) {
            throw new SpecError('DuplicateSceneId', `Scene id "${scene.id}" is used more than once`);
        }
        seen.add(scene.id);
    }
}

function checkTransitionEndpoints(scenes: RawScene[], transitions: RawTransition[]): void {
    const ids = new Set(scenes.map((scene) => scene.id));
    for (const transition of transitions) {
        for (const ref of [transition.from_scene, transition.to_scene]) {
            if (!ids.has(ref)) {
                throw new SpecError(
                    'UnknownSceneReference',
                    `Transition ${transition.from_scene} -> ${transition.to_scene} references unknown scene "${ref}"`
                );
            }
        }
    }
}

/**
 * Transitions must form one linear chain that follows the scene declaration order.
 */
function checkTransitionTopology(scenes: RawScene[], transitions: RawTransition[]): void {
    const next = new Map<string, string>();
    const incoming = new Set<string>();

    for (const { from_scene: from, to_scene: to } of transitions) {
        if (from === to) {
            throw new SpecError('InvalidTransitionTopology', `Transition from "${from}" to itself`);
        }
        if (incoming.has(to)) {
            throw new SpecError('InvalidTransitionTopology', `Scene "${to}" has more than one incoming transition`);
        }
        if (next.has(from)) {
            throw new SpecError('InvalidTransitionTopology', `Scene "${from}" has more than one outgoing transition`);
        }
        incoming.add(to);
        next.set(from, to);
    }

    for (const start of next.keys()) {
        let current: string | undefined = next.get(start);
        let steps = 0;
        while (current !== undefined && steps <= next.size) {
            if (current === start) {
                throw new SpecError('InvalidTransitionTopology', `Transitions form a cycle through scene "${start}"`);
            }
            current = next.get(current);
            steps++;
        }
    }

    const order = new Map<string, number>(scenes.map((scene, index) => [scene.id, index]));
    for (const [from, to] of next) {
        if ((order.get(to) ?? -1) !== (order.get(from) ?? -2) + 1) {
            throw new SpecError(
                'InvalidTransitionTopology',
                `Transition ${from} -> ${to} does not join consecutive scenes`
            );
        }
    }
}

/**
 * Explicit duration, then media duration, then the default. Video scenes whose
 * media has not been probed yet stay unknown (null).
 */
function inferSceneDuration(scene: RawScene, options: ValidationOptions): number | null {
    if (scene.duration !== undefined && scene.duration !== null) {
        return scene.duration;
    }
    const mediaDuration = options.mediaDurations?.get(scene.id);
    if (mediaDuration !== undefined) {
        return mediaDuration;
    }
    return scene.media.type === 'image' ? options.defaultSceneDurationSeconds : null;
}

function checkOverlayBounds(scenes: RawScene[], durations: Map<string, number | null>): void {
    for (const scene of scenes) {
        const sceneDuration = durations.get(scene.id) ?? null;
        if (sceneDuration === null) {
            continue;
        }
        (scene.text_overlays ?? []).forEach((overlay, index) => {
            const start = overlay.start_time ?? COMPOSITION_DEFAULTS.overlay.startTime;
            if (overlay.duration === undefined || overlay.duration === null) {
                if (start >= sceneDuration - EPSILON) {
                    throw new SpecError(
                        'OverlayOutOfBounds',
                        `Overlay ${index} of scene "${scene.id}" starts at ${start}s but the scene lasts ${sceneDuration}s`
                    );
                }
                return;
            }
            const end = start + overlay.duration;
            if (end > sceneDuration + EPSILON) {
                throw new SpecError(
                    'OverlayOutOfBounds',
                    `Overlay ${index} of scene "${scene.id}" ends at ${roundSeconds(end)}s but the scene lasts ${sceneDuration}s`
                );
            }
        });
    }
}

function fillScene(scene: RawScene, duration: number | null): Scene {
    return {
        id: scene.id,
        duration,
        media: fillMedia(scene.media),
        audio: scene.audio ? fillAudio(scene.audio, COMPOSITION_DEFAULTS.sceneAudio) : null,
        text_overlays: (scene.text_overlays ?? []).map((overlay) => fillOverlay(overlay, duration)),
    };
}

function fillMedia(media: RawMediaRef): MediaRef {
    const effects = media.effects ?? {};
    const defaults = COMPOSITION_DEFAULTS.effects;
    return {
        type: media.type,
        source: media.source,
        start_time: media.start_time ?? 0,
        end_time: media.end_time ?? null,
        effects: {
            zoom: effects.zoom ?? defaults.zoom,
            pan: effects.pan ?? defaults.pan,
            rotation: effects.rotation ?? defaults.rotation,
            speed: effects.speed ?? defaults.speed,
            brightness: effects.brightness ?? defaults.brightness,
        },
    };
}

function fillAudio(
    audio: RawAudioRef,
    defaults: { volume: number; fadeIn: number; fadeOut: number; loop: boolean }
): AudioRef {
    return {
        source: audio.source,
        volume: audio.volume ?? defaults.volume,
        fade_in: audio.fade_in ?? defaults.fadeIn,
        fade_out: audio.fade_out ?? defaults.fadeOut,
        loop: audio.loop ?? defaults.loop,
    };
}

function fillOverlay(overlay: RawTextOverlay, sceneDuration: number | null): TextOverlay {
    const start = overlay.start_time ?? COMPOSITION_DEFAULTS.overlay.startTime;
    let duration = overlay.duration ?? null;
    if (duration === null && sceneDuration !== null) {
        duration = roundSeconds(sceneDuration - start);
    }
    return {
        text: overlay.text,
        position: { x: overlay.position.x, y: overlay.position.y },
        font_size: overlay.font_size ?? COMPOSITION_DEFAULTS.overlay.fontSize,
        color: overlay.color ?? COMPOSITION_DEFAULTS.overlay.color,
        background_color: overlay.background_color ?? null,
        start_time: start,
        duration,
    };
}

function fillTransition(transition: RawTransition): Transition {
    return {
        from_scene: transition.from_scene,
        to_scene: transition.to_scene,
        type: transition.type,
        duration: transition.duration ?? COMPOSITION_DEFAULTS.transition.duration,
        easing: transition.easing ?? COMPOSITION_DEFAULTS.transition.easing,
    };
}

function roundSeconds(value: number): number {
    return Math.round(value * 1e6) / 1e6;
}
