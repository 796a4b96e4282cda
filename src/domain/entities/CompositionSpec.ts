/**
 * Composition types.
 *
 * `Raw*` types describe the JSON body as submitted: optional fields may be
 * absent or null. The unprefixed types are the validated, fully defaulted
 * form stored on a job.
 */

export type VisualMediaType = 'image' | 'video';

export type Quality = 'low' | 'medium' | 'high';

export type ContainerFormat = 'mp4' | 'avi' | 'mov';

export type TransitionType =
    | 'fade'
    | 'dissolve'
    | 'wipe'
    | 'slide_left'
    | 'slide_right'
    | 'slide_up'
    | 'slide_down';

export type PanDirection =
    | 'none'
    | 'left_to_right'
    | 'right_to_left'
    | 'top_to_bottom'
    | 'bottom_to_top';

export type HorizontalAnchor = 'center' | 'left' | 'right';
export type VerticalAnchor = 'center' | 'top' | 'bottom';

export interface Position {
    x: number | HorizontalAnchor;
    y: number | VerticalAnchor;
}

// ---------------------------------------------------------------------------
// Raw input
// ---------------------------------------------------------------------------

export interface RawMediaEffects {
    zoom?: number | null;
    pan?: PanDirection | null;
    rotation?: number | null;
    speed?: number | null;
    brightness?: number | null;
}

export interface RawMediaRef {
    type: VisualMediaType;
    source: string;
    start_time?: number | null;
    end_time?: number | null;
    effects?: RawMediaEffects | null;
}

export interface RawAudioRef {
    source: string;
    volume?: number | null;
    fade_in?: number | null;
    fade_out?: number | null;
    loop?: boolean | null;
}

export interface RawTextOverlay {
    text: string;
    position: Position;
    font_size?: number | null;
    color?: string | null;
    background_color?: string | null;
    start_time?: number | null;
    duration?: number | null;
}

export interface RawScene {
    id: string;
    duration?: number | null;
    media: RawMediaRef;
    audio?: RawAudioRef | null;
    text_overlays?: RawTextOverlay[] | null;
}

export interface RawTransition {
    from_scene: string;
    to_scene: string;
    type: TransitionType;
    duration?: number | null;
    easing?: string | null;
}

export interface RawVideoSettings {
    width?: number | null;
    height?: number | null;
    fps?: number | null;
    quality?: Quality | null;
}

export interface RawOutputSettings {
    format?: ContainerFormat | null;
    codec?: string | null;
}

export interface RawCompositionSpec {
    title: string;
    settings?: RawVideoSettings | null;
    output?: RawOutputSettings | null;
    scenes: RawScene[];
    transitions?: RawTransition[] | null;
    global_audio?: { background_music?: RawAudioRef | null } | null;
    watermark?: string | null;
}

// ---------------------------------------------------------------------------
// Validated form
// ---------------------------------------------------------------------------

export interface MediaEffects {
    zoom: number;
    pan: PanDirection;
    rotation: number;
    speed: number;
    brightness: number;
}

export interface MediaRef {
    type: VisualMediaType;
    source: string;
    start_time: number;
    /** null plays the clip to its end */
    end_time: number | null;
    effects: MediaEffects;
}

export interface AudioRef {
    source: string;
    volume: number;
    fade_in: number;
    fade_out: number;
    loop: boolean;
}

export interface TextOverlay {
    text: string;
    position: Position;
    font_size: number;
    color: string;
    background_color: string | null;
    start_time: number;
    /** null only while the owning scene's duration is still unknown */
    duration: number | null;
}

export interface Scene {
    id: string;
    /** null only for video scenes whose duration comes from the probed media */
    duration: number | null;
    media: MediaRef;
    audio: AudioRef | null;
    text_overlays: TextOverlay[];
}

export interface Transition {
    from_scene: string;
    to_scene: string;
    type: TransitionType;
    duration: number;
    easing: string;
}

export interface VideoSettings {
    width: number;
    height: number;
    fps: number;
    quality: Quality;
}

export interface OutputSettings {
    format: ContainerFormat;
    codec: string;
}

export interface CompositionSpec {
    title: string;
    settings: VideoSettings;
    output: OutputSettings;
    scenes: Scene[];
    transitions: Transition[];
    global_audio: { background_music: AudioRef | null };
    watermark: string | null;
}
