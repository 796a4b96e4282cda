import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import path from 'path';
import { Position, Quality, TransitionType } from '../../domain/entities/CompositionSpec';
import {
    AudioMixParams,
    FinalEncodeParams,
    OverlayCompositeParams,
    SceneRenderParams,
    TransitionBlendParams,
} from '../../domain/entities/RenderPlan';
import { StageError, StageErrorKind } from '../../domain/errors/CompositionErrors';
import { IRenderEngine, StageInstructions } from '../../domain/ports/IRenderEngine';

/**
 * The subset of a fluent-ffmpeg command the engine drives.
 */
export interface EngineCommand {
    input(source: string): unknown;
    inputOptions(options: string[]): unknown;
    complexFilter(filters: string[]): unknown;
    outputOptions(options: string[]): unknown;
    on(event: string, listener: (...args: unknown[]) => void): unknown;
    save(output: string): unknown;
    kill(signal: string): unknown;
}

export type CommandFactory = () => EngineCommand;

export interface FFmpegRenderEngineOptions {
    /** Hard limit for one stage; the process is killed when it runs over */
    timeoutMs: number;
    commandFactory?: CommandFactory;
}

export interface StageInput {
    path: string;
    options: string[];
}

/**
 * Everything needed to run one ffmpeg invocation.
 */
export interface StageCommand {
    inputs: StageInput[];
    complexFilter: string[];
    outputOptions: string[];
    /** Written before the command runs (drawtext reads overlay text from files) */
    textFiles: Array<{ path: string; content: string }>;
}

const VIDEO_CODECS: Record<string, string> = {
    h264: 'libx264',
    h265: 'libx265',
    vp9: 'libvpx-vp9',
    mpeg4: 'mpeg4',
};

const VIDEO_BITRATES: Record<Quality, string> = {
    low: '1000k',
    medium: '2500k',
    high: '5000k',
};

const XFADE_TRANSITIONS: Record<TransitionType, string> = {
    fade: 'fade',
    dissolve: 'dissolve',
    wipe: 'wipeleft',
    slide_left: 'slideleft',
    slide_right: 'slideright',
    slide_up: 'slideup',
    slide_down: 'slidedown',
};

// Pan needs room to move inside the frame
const MIN_PAN_ZOOM = 1.2;

// Intermediate artifacts are re-encoded by the final stage, so favour speed
const INTERMEDIATE_VIDEO_OPTIONS = ['-c:v libx264', '-preset veryfast', '-crf 18', '-pix_fmt yuv420p'];

/**
 * Runs render stages locally using FFmpeg.
 * Requires 'ffmpeg' to be installed in the system.
 */
export class FFmpegRenderEngine implements IRenderEngine {
    private readonly timeoutMs: number;
    private readonly commandFactory: CommandFactory;

    constructor(options: FFmpegRenderEngineOptions) {
        this.timeoutMs = options.timeoutMs;
        this.commandFactory = options.commandFactory ?? (() => ffmpeg());
    }

    async execute(instructions: StageInstructions): Promise<string> {
        const { jobId, stage, outputPath } = instructions;
        const command = buildStageCommand(instructions);

        await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
        for (const file of command.textFiles) {
            await fs.promises.writeFile(file.path, file.content, 'utf-8');
        }

        console.log(`[FFmpeg] ${jobId}: running ${stage.id} (${stage.kind})`);
        const startedAt = Date.now();
        await this.run(command, outputPath, stage.id);
        console.log(`[FFmpeg] ${jobId}: ${stage.id} finished in ${Date.now() - startedAt}ms`);
        return outputPath;
    }

    private run(command: StageCommand, outputPath: string, stageId: string): Promise<void> {
        return new Promise((resolve, reject) => {
            const cmd = this.commandFactory();
            let settled = false;

            for (const input of command.inputs) {
                cmd.input(input.path);
                if (input.options.length > 0) {
                    cmd.inputOptions(input.options);
                }
            }
            if (command.complexFilter.length > 0) {
                cmd.complexFilter(command.complexFilter);
            }
            cmd.outputOptions(command.outputOptions);

            const timer = setTimeout(() => {
                if (settled) {
                    return;
                }
                settled = true;
                cmd.kill('SIGKILL');
                reject(new StageError('EngineTimeout', `Stage ${stageId} exceeded ${this.timeoutMs}ms`));
            }, this.timeoutMs);

            cmd.on('end', () => {
                if (settled) {
                    return;
                }
                settled = true;
                clearTimeout(timer);
                resolve();
            });
            cmd.on('error', (err: unknown, _stdout: unknown, stderr: unknown) => {
                if (settled) {
                    return;
                }
                settled = true;
                clearTimeout(timer);
                reject(classifyEngineError(err, typeof stderr === 'string' ? stderr : ''));
            });
            cmd.save(outputPath);
        });
    }
}

/**
 * Translates a stage into ffmpeg inputs, filter graph and output options.
 */
export function buildStageCommand(instructions: StageInstructions): StageCommand {
    const { stage, inputPaths, outputPath } = instructions;
    if (inputPaths.length !== stage.inputs.length) {
        throw new StageError(
            'MalformedInput',
            `Stage ${stage.id} expects ${stage.inputs.length} inputs, got ${inputPaths.length}`
        );
    }

    const params = stage.params;
    switch (params.kind) {
        case 'scene-render':
            return buildSceneRender(params, inputPaths);
        case 'overlay-composite':
            return buildOverlayComposite(params, inputPaths, outputPath);
        case 'transition-blend':
            return buildTransitionBlend(params, inputPaths);
        case 'audio-mix':
            return buildAudioMix(params, inputPaths);
        case 'final-encode':
            return buildFinalEncode(params, inputPaths, outputPath);
    }
}

function buildSceneRender(params: SceneRenderParams, inputPaths: string[]): StageCommand {
    const { width, height, fps } = params.settings;
    const { zoom, pan, rotation, speed, brightness } = params.effects;
    const duration = params.durationSeconds;
    const isVideo = params.mediaType === 'video';

    const inputOptions = isVideo
        ? trimOptions(params.trimStartSeconds, params.trimEndSeconds)
        : ['-loop 1', `-t ${num(duration)}`];

    const chain: string[] = [];
    if (isVideo && speed !== 1) {
        chain.push(`setpts=PTS/${num(speed)}`);
    }
    chain.push(
        `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
        `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`
    );

    const effectiveZoom = pan === 'none' ? zoom : Math.max(zoom, MIN_PAN_ZOOM);
    if (effectiveZoom !== 1) {
        chain.push(`scale=${even(width * effectiveZoom)}:${even(height * effectiveZoom)}`);
        if (effectiveZoom > 1) {
            const [x, y] = panOffsets(pan, duration);
            chain.push(`crop=${width}:${height}:${x}:${y}`);
        } else {
            chain.push(`pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`);
        }
    }
    if (rotation !== 0) {
        chain.push(`rotate=${num(rotation)}*PI/180:ow=${width}:oh=${height}:c=black`);
    }
    if (brightness !== 1) {
        chain.push(`eq=brightness=${num(clamp(brightness - 1, -1, 1))}`);
    }
    if (isVideo) {
        // Freeze the last frame when the clip is shorter than the scene
        chain.push('tpad=stop_mode=clone:stop=-1');
    }
    chain.push(`fps=${fps}`, 'setsar=1', 'format=yuv420p');

    return {
        inputs: [{ path: inputPaths[0], options: inputOptions }],
        complexFilter: [`[0:v]${chain.join(',')}[v]`],
        outputOptions: ['-map [v]', '-an', ...INTERMEDIATE_VIDEO_OPTIONS, `-t ${num(duration)}`],
        textFiles: [],
    };
}

function buildOverlayComposite(
    params: OverlayCompositeParams,
    inputPaths: string[],
    outputPath: string
): StageCommand {
    const textFiles = params.overlays.map((overlay, i) => ({
        path: `${outputPath}.text-${i}.txt`,
        content: overlay.text,
    }));

    const filters = params.overlays.map((overlay, i) => {
        const [x, y] = overlayPosition(overlay.position);
        const end = overlay.start_time + overlay.duration;
        const options = [
            `textfile='${escapeFilterValue(textFiles[i].path)}'`,
            'expansion=none',
            `fontsize=${overlay.font_size}`,
            `fontcolor=${ffmpegColor(overlay.color)}`,
            `x=${x}`,
            `y=${y}`,
        ];
        if (overlay.background_color) {
            options.push('box=1', `boxcolor=${ffmpegColor(overlay.background_color)}`, 'boxborderw=10');
        }
        options.push(`enable='between(t,${num(overlay.start_time)},${num(end)})'`);
        return `drawtext=${options.join(':')}`;
    });

    return {
        inputs: [{ path: inputPaths[0], options: [] }],
        complexFilter: [`[0:v]${filters.join(',')}[v]`],
        outputOptions: ['-map [v]', '-an', ...INTERMEDIATE_VIDEO_OPTIONS, `-t ${num(params.durationSeconds)}`],
        textFiles,
    };
}

function buildTransitionBlend(params: TransitionBlendParams, inputPaths: string[]): StageCommand {
    const duration = num(params.durationSeconds);
    return {
        inputs: [
            { path: inputPaths[0], options: [`-ss ${num(params.fromOffsetSeconds)}`] },
            { path: inputPaths[1], options: [] },
        ],
        complexFilter: [
            `[0:v][1:v]xfade=transition=${XFADE_TRANSITIONS[params.type]}:duration=${duration}:offset=0[v]`,
        ],
        outputOptions: ['-map [v]', '-an', ...INTERMEDIATE_VIDEO_OPTIONS, `-t ${duration}`],
        textFiles: [],
    };
}

function buildAudioMix(params: AudioMixParams, inputPaths: string[]): StageCommand {
    const filters: string[] = [];
    const labels: string[] = [];

    params.tracks.forEach((track, i) => {
        const duration = track.durationSeconds;
        const chain = [`atrim=0:${num(duration)}`, 'asetpts=PTS-STARTPTS', `volume=${num(track.volume)}`];
        if (track.fadeInSeconds > 0) {
            chain.push(`afade=t=in:st=0:d=${num(Math.min(track.fadeInSeconds, duration))}`);
        }
        if (track.fadeOutSeconds > 0) {
            const fadeOut = Math.min(track.fadeOutSeconds, duration);
            chain.push(`afade=t=out:st=${num(duration - fadeOut)}:d=${num(fadeOut)}`);
        }
        if (track.offsetSeconds > 0) {
            const delayMs = Math.round(track.offsetSeconds * 1000);
            chain.push(`adelay=${delayMs}|${delayMs}`);
        }
        filters.push(`[${track.input}:a]${chain.join(',')}[a${i}]`);
        labels.push(`[a${i}]`);
    });

    // normalize=0 keeps each track's volume a plain linear multiplier
    filters.push(`${labels.join('')}amix=inputs=${labels.length}:duration=longest:normalize=0[aout]`);

    return {
        inputs: inputPaths.map((inputPath, index) => {
            const looped = params.tracks.some((track) => track.input === index && track.loop);
            return { path: inputPath, options: looped ? ['-stream_loop -1'] : [] };
        }),
        complexFilter: filters,
        outputOptions: ['-map [aout]', '-c:a aac', '-b:a 192k', `-t ${num(params.totalDurationSeconds)}`],
        textFiles: [],
    };
}

function buildFinalEncode(params: FinalEncodeParams, inputPaths: string[], outputPath: string): StageCommand {
    const { width, fps, quality } = params.settings;
    const filters: string[] = [];
    const labels: string[] = [];

    params.segments.forEach((segment, i) => {
        const trim = segment.type === 'scene'
            ? `trim=start=${num(segment.trimStartSeconds)}:end=${num(segment.trimEndSeconds)},`
            : '';
        filters.push(`[${segment.input}:v]${trim}setpts=PTS-STARTPTS[s${i}]`);
        labels.push(`[s${i}]`);
    });
    filters.push(`${labels.join('')}concat=n=${labels.length}:v=1:a=0[vcat]`);

    let videoLabel = '[vcat]';
    if (params.watermarkInput !== null) {
        filters.push(`[${params.watermarkInput}:v]scale=${even(width * 0.15)}:-1[wm]`);
        filters.push('[vcat][wm]overlay=W-w-20:H-h-20[vout]');
        videoLabel = '[vout]';
    }

    const outputOptions = [
        `-map ${videoLabel}`,
        `-c:v ${VIDEO_CODECS[params.output.codec] ?? params.output.codec}`,
        `-b:v ${VIDEO_BITRATES[quality]}`,
        `-r ${fps}`,
        '-pix_fmt yuv420p',
    ];
    if (params.audioInput !== null) {
        outputOptions.push(`-map ${params.audioInput}:a`, '-c:a aac');
    } else {
        outputOptions.push('-an');
    }
    outputOptions.push(`-t ${num(params.totalDurationSeconds)}`);
    if (path.extname(outputPath) === '.mp4' || path.extname(outputPath) === '.mov') {
        outputOptions.push('-movflags +faststart');
    }

    return {
        inputs: inputPaths.map((inputPath) => ({ path: inputPath, options: [] })),
        complexFilter: filters,
        outputOptions,
        textFiles: [],
    };
}

/**
 * Maps an ffmpeg failure to a stage error kind from its message and stderr.
 */
export function classifyEngineError(err: unknown, stderr: string): StageError {
    const message = err instanceof Error ? err.message : String(err);
    const text = `${message}\n${stderr}`;
    const kind = classifyText(text);
    const lastLine = stderr.trim().split('\n').pop() ?? '';
    return new StageError(kind, lastLine ? `${message} (${lastLine.trim()})` : message);
}

function classifyText(text: string): StageErrorKind {
    if (/killed with signal|timed? ?out/i.test(text)) {
        return 'EngineTimeout';
    }
    if (/Resource temporarily unavailable|Connection reset|Broken pipe|No space left|Input\/output error|EAGAIN|ETIMEDOUT/i.test(text)) {
        return 'TransientIO';
    }
    if (/No such file or directory|Invalid data found|could not find codec parameters|Error parsing|No such filter|Invalid argument/i.test(text)) {
        return 'MalformedInput';
    }
    return 'EncodeRejected';
}

function trimOptions(start: number, end: number | null): string[] {
    const options: string[] = [];
    if (start > 0) {
        options.push(`-ss ${num(start)}`);
    }
    if (end !== null) {
        options.push(`-to ${num(end)}`);
    }
    return options;
}

function panOffsets(pan: SceneRenderParams['effects']['pan'], duration: number): [string, string] {
    const progress = `min(t/${num(duration)},1)`;
    switch (pan) {
        case 'left_to_right':
            return [`(iw-ow)*${progress}`, '(ih-oh)/2'];
        case 'right_to_left':
            return [`(iw-ow)*(1-${progress})`, '(ih-oh)/2'];
        case 'top_to_bottom':
            return ['(iw-ow)/2', `(ih-oh)*${progress}`];
        case 'bottom_to_top':
            return ['(iw-ow)/2', `(ih-oh)*(1-${progress})`];
        case 'none':
            return ['(iw-ow)/2', '(ih-oh)/2'];
    }
}

function overlayPosition(position: Position): [string, string] {
    const x = typeof position.x === 'number'
        ? num(position.x)
        : { left: '0', center: '(w-text_w)/2', right: 'w-text_w' }[position.x];
    const y = typeof position.y === 'number'
        ? num(position.y)
        : { top: '0', center: '(h-text_h)/2', bottom: 'h-text_h' }[position.y];
    return [x, y];
}

function ffmpegColor(hex: string): string {
    return `0x${hex.replace('#', '').toUpperCase()}`;
}

/**
 * Escapes a value placed inside single quotes in a filter graph.
 */
export function escapeFilterValue(value: string): string {
    return value.replace(/\\/g, '/').replace(/'/g, "'\\''").replace(/:/g, '\\:');
}

function num(value: number): string {
    return String(Math.round(value * 1000) / 1000);
}

function even(value: number): number {
    return Math.max(2, Math.round(value / 2) * 2);
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}
