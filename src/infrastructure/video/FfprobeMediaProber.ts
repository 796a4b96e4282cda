import ffmpeg from 'fluent-ffmpeg';
import { ResolutionError } from '../../domain/errors/CompositionErrors';
import { IMediaProber } from '../../domain/ports/IMediaProber';

/**
 * Reads media durations with ffprobe.
 * Requires 'ffprobe' to be installed in the system.
 */
export class FfprobeMediaProber implements IMediaProber {
    probeDurationSeconds(filePath: string): Promise<number> {
        return new Promise((resolve, reject) => {
            ffmpeg.ffprobe(filePath, (err, metadata) => {
                if (err) {
                    reject(new ResolutionError('UnreadableMedia', `Cannot probe ${filePath}: ${err.message}`, filePath));
                    return;
                }
                const duration = Number(metadata.format.duration);
                if (!Number.isFinite(duration) || duration <= 0) {
                    reject(new ResolutionError('UnreadableMedia', `No duration in ${filePath}`, filePath));
                    return;
                }
                resolve(duration);
            });
        });
    }
}
