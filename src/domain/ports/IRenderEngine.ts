import { RenderStage } from '../entities/RenderPlan';

/**
 * Everything the engine needs to run one stage, with every input resolved to a file.
 */
export interface StageInstructions {
    jobId: string;
    stage: RenderStage;
    /** Absolute paths, in the order of `stage.inputs` */
    inputPaths: string[];
    outputPath: string;
}

/**
 * IRenderEngine - Port for the external media rendering engine.
 * Implementations: FFmpegRenderEngine
 */
export interface IRenderEngine {
    /**
     * Runs a stage to completion. Re-running with the same instructions writes
     * the same output path.
     * @returns Path of the produced artifact
     * @throws StageError classified as transient or permanent
     */
    execute(instructions: StageInstructions): Promise<string>;
}
