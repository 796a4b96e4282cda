import { compileTimeline, estimateProcessingSeconds } from '../../../src/domain/services/TimelineCompiler';
import { ResolutionError, SpecError } from '../../../src/domain/errors/CompositionErrors';
import {
    captureError,
    imageScene,
    mediaSetFor,
    rawComposition,
    twoSceneComposition,
    validated,
    videoScene,
} from '../../helpers/compositions';

const options = { defaultSceneDurationSeconds: 5, timePrecisionDigits: 6 };

describe('TimelineCompiler', () => {
    describe('compileTimeline', () => {
        it('should overlap two scenes by their transition', () => {
            const spec = validated(twoSceneComposition());

            const plan = compileTimeline(spec, mediaSetFor(spec), options);

            expect(plan.totalDurationSeconds).toBe(14);
            expect(plan.timeline).toEqual([
                { sceneId: 's1', startSeconds: 0, durationSeconds: 5 },
                { sceneId: 's2', startSeconds: 4, durationSeconds: 10 },
            ]);
            expect(plan.warnings).toEqual([]);
        });

        it('should order stages so every input is produced first', () => {
            const spec = validated(twoSceneComposition());

            const plan = compileTimeline(spec, mediaSetFor(spec), options);

            expect(plan.stages.map((stage) => stage.id)).toEqual(['scene-0', 'scene-1', 'blend-0-1', 'final-encode']);
            expect(plan.stages.map((stage) => stage.weight)).toEqual([5, 10, 1, 7]);
            expect(plan.totalWeight).toBe(23);
            expect(plan.stages.every((stage) => stage.status === 'pending' && stage.attempts === 0)).toBe(true);
        });

        it('should describe the blend and the final cut list', () => {
            const spec = validated(twoSceneComposition());

            const plan = compileTimeline(spec, mediaSetFor(spec), options);
            const blend = plan.stages[2];
            const final = plan.stages[3];

            expect(blend.inputs).toEqual([
                { type: 'stage', stageId: 'scene-0' },
                { type: 'stage', stageId: 'scene-1' },
            ]);
            expect(blend.params).toEqual({
                kind: 'transition-blend',
                fromSceneId: 's1',
                toSceneId: 's2',
                type: 'fade',
                easing: 'linear',
                durationSeconds: 1,
                fromOffsetSeconds: 4,
            });
            expect(final.output).toBe('final-encode.mp4');
            expect(final.inputs).toEqual([
                { type: 'stage', stageId: 'scene-0' },
                { type: 'stage', stageId: 'blend-0-1' },
                { type: 'stage', stageId: 'scene-1' },
            ]);
            expect(final.params).toEqual(expect.objectContaining({
                kind: 'final-encode',
                totalDurationSeconds: 14,
                audioInput: null,
                watermarkInput: null,
                segments: [
                    { type: 'scene', input: 0, sceneId: 's1', trimStartSeconds: 0, trimEndSeconds: 4 },
                    { type: 'blend', input: 1, durationSeconds: 1 },
                    { type: 'scene', input: 2, sceneId: 's2', trimStartSeconds: 1, trimEndSeconds: 10 },
                ],
            }));
        });

        it('should point scene stages at the resolved media files', () => {
            const spec = validated(twoSceneComposition());

            const plan = compileTimeline(spec, mediaSetFor(spec), options);

            expect(plan.stages[0].inputs).toEqual([{ type: 'media', source: 's1.jpg', path: '/media/s1.jpg' }]);
            expect(plan.stages[0].output).toBe('scene-0.mp4');
        });

        it('should clip a transition longer than an adjacent scene and warn', () => {
            const spec = validated(rawComposition([imageScene('a', 2), imageScene('b', 5)], {
                transitions: [{ from_scene: 'a', to_scene: 'b', type: 'fade', duration: 3 }],
            }));

            const plan = compileTimeline(spec, mediaSetFor(spec), options);

            expect(plan.warnings).toEqual([{
                code: 'TransitionClipped',
                message: 'Transition a -> b shortened from 3s to 2s to fit the adjacent scenes',
            }]);
            expect(plan.totalDurationSeconds).toBe(5);
            expect(plan.stages.find((stage) => stage.id === 'final-encode')?.params).toEqual(expect.objectContaining({
                segments: [
                    { type: 'blend', input: 0, durationSeconds: 2 },
                    { type: 'scene', input: 1, sceneId: 'b', trimStartSeconds: 2, trimEndSeconds: 5 },
                ],
            }));
        });

        it('should reject transitions that overlap more than a scene lasts', () => {
            const spec = validated(rawComposition([imageScene('a', 5), imageScene('b', 2), imageScene('c', 5)], {
                transitions: [
                    { from_scene: 'a', to_scene: 'b', type: 'fade', duration: 1.5 },
                    { from_scene: 'b', to_scene: 'c', type: 'fade', duration: 1.5 },
                ],
            }));

            const error = captureError(() => compileTimeline(spec, mediaSetFor(spec), options));

            expect(error).toBeInstanceOf(SpecError);
            expect(error).toMatchObject({
                kind: 'NegativeTimelineDuration',
                message: 'Transitions around scene "b" overlap 3s but the scene only lasts 2s',
            });
        });

        it('should add overlay, audio and watermark stages', () => {
            const spec = validated(rawComposition(
                [
                    imageScene('a', 4, {
                        text_overlays: [{ text: 'Hi', position: { x: 'center', y: 'center' }, start_time: 1 }],
                    }),
                    imageScene('b', 4, { audio: { source: 'b.mp3' } }),
                ],
                {
                    transitions: [{ from_scene: 'a', to_scene: 'b', type: 'dissolve', duration: 0.5 }],
                    global_audio: { background_music: { source: 'music.mp3' } },
                    watermark: 'logo.png',
                }
            ));

            const plan = compileTimeline(spec, mediaSetFor(spec), options);

            expect(plan.stages.map((stage) => `${stage.id}:${stage.weight}`)).toEqual([
                'scene-0:4',
                'overlay-0:1',
                'scene-1:4',
                'blend-0-1:0.5',
                'audio-mix:1.75',
                'final-encode:3.75',
            ]);
            expect(plan.totalWeight).toBe(15);
            expect(plan.stages[3].inputs).toEqual([
                { type: 'stage', stageId: 'overlay-0' },
                { type: 'stage', stageId: 'scene-1' },
            ]);
        });

        it('should place audio tracks on the timeline', () => {
            const spec = validated(rawComposition(
                [imageScene('a', 4), imageScene('b', 4, { audio: { source: 'b.mp3', fade_in: 0.5 } })],
                {
                    transitions: [{ from_scene: 'a', to_scene: 'b', type: 'dissolve', duration: 0.5 }],
                    global_audio: { background_music: { source: 'music.mp3' } },
                }
            ));

            const plan = compileTimeline(spec, mediaSetFor(spec), options);
            const mix = plan.stages.find((stage) => stage.id === 'audio-mix');

            expect(mix?.output).toBe('audio-mix.m4a');
            expect(mix?.inputs).toEqual([
                { type: 'media', source: 'b.mp3', path: '/media/b.mp3' },
                { type: 'media', source: 'music.mp3', path: '/media/music.mp3' },
            ]);
            expect(mix?.params).toEqual({
                kind: 'audio-mix',
                totalDurationSeconds: 7.5,
                tracks: [
                    {
                        input: 0,
                        role: 'scene',
                        sceneId: 'b',
                        offsetSeconds: 3.5,
                        durationSeconds: 4,
                        volume: 1,
                        fadeInSeconds: 0.5,
                        fadeOutSeconds: 0,
                        loop: false,
                    },
                    {
                        input: 1,
                        role: 'background',
                        sceneId: null,
                        offsetSeconds: 0,
                        durationSeconds: 7.5,
                        volume: 0.3,
                        fadeInSeconds: 0,
                        fadeOutSeconds: 0,
                        loop: true,
                    },
                ],
            });
        });

        it('should reference audio and watermark inputs from the final stage', () => {
            const spec = validated(rawComposition([imageScene('a', 3, { audio: { source: 'a.mp3' } })], {
                watermark: 'logo.png',
            }));

            const plan = compileTimeline(spec, mediaSetFor(spec), options);
            const final = plan.stages[plan.stages.length - 1];

            expect(final.inputs).toEqual([
                { type: 'stage', stageId: 'scene-0' },
                { type: 'stage', stageId: 'audio-mix' },
                { type: 'media', source: 'logo.png', path: '/media/logo.png' },
            ]);
            expect(final.params).toEqual(expect.objectContaining({ audioInput: 1, watermarkInput: 2 }));
        });

        it('should add durations without floating point drift', () => {
            const spec = validated(rawComposition([imageScene('a', 0.1), imageScene('b', 0.2)]));

            const plan = compileTimeline(spec, mediaSetFor(spec), options);

            expect(plan.totalDurationSeconds).toBe(0.3);
            expect(plan.timeline[1].startSeconds).toBe(0.1);
        });

        it('should take a video scene duration from its probed media', () => {
            const spec = validated(rawComposition([
                { id: 'clip', media: { type: 'video', source: 'clip.mp4', start_time: 2 } },
            ]));

            const plan = compileTimeline(spec, mediaSetFor(spec, { 'clip.mp4': 12 }), options);

            expect(plan.totalDurationSeconds).toBe(10);
            expect(plan.stages[0].params).toEqual(expect.objectContaining({
                kind: 'scene-render',
                mediaType: 'video',
                durationSeconds: 10,
                trimStartSeconds: 2,
                trimEndSeconds: null,
            }));
        });

        it('should fail when a source was not resolved', () => {
            const spec = validated(rawComposition([videoScene('clip', 3)]));

            const error = captureError(() => compileTimeline(spec, new Map(), options));

            expect(error).toBeInstanceOf(ResolutionError);
            expect(error).toMatchObject({ kind: 'NotFound', source: 'clip.mp4' });
        });

        it('should compile the same plan for the same input', () => {
            const spec = validated(twoSceneComposition());
            const media = mediaSetFor(spec);

            expect(compileTimeline(spec, media, options)).toEqual(compileTimeline(spec, media, options));
        });
    });

    describe('estimateProcessingSeconds', () => {
        it('should scale with scenes and transitions', () => {
            expect(estimateProcessingSeconds(validated(twoSceneComposition()))).toBe(65);
        });

        it('should apply the quality multiplier', () => {
            const raw = twoSceneComposition();
            const spec = validated({ ...raw, settings: { quality: 'high' } });

            expect(estimateProcessingSeconds(spec)).toBe(97);
        });
    });
});
