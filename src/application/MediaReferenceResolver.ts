import { CompositionSpec } from '../domain/entities/CompositionSpec';
import { ResolvedMedia, ResolvedMediaSet, StoredMediaType, mediaTypeFromExtension } from '../domain/entities/MediaAsset';
import { ResolutionError } from '../domain/errors/CompositionErrors';
import { IMediaProber } from '../domain/ports/IMediaProber';
import { IRemoteFetcher } from '../domain/ports/IRemoteFetcher';
import { IUploadStore } from '../domain/ports/IUploadStore';

export interface ResolverOptions {
    remoteFetchMaxBytes: number;
    /** Empty list allows every host */
    allowedRemoteDomains: string[];
}

/**
 * What a reference expects the file behind it to be.
 */
type ReferenceRole = 'image' | 'video' | 'watermark' | 'audio';

const ACCEPTED_TYPES: Record<ReferenceRole, readonly StoredMediaType[]> = {
    image: ['image'],
    video: ['video'],
    watermark: ['image'],
    // A video's soundtrack can serve as an audio reference
    audio: ['audio', 'video'],
};

const REMOTE_SOURCE = /^https?:\/\//i;

/**
 * Turns every source string in a composition into a local, validated file.
 */
export class MediaReferenceResolver {
    private readonly uploadStore: IUploadStore;
    private readonly remoteFetcher: IRemoteFetcher;
    private readonly prober: IMediaProber;
    private readonly options: ResolverOptions;

    constructor(
        uploadStore: IUploadStore,
        remoteFetcher: IRemoteFetcher,
        prober: IMediaProber,
        options: ResolverOptions
    ) {
        this.uploadStore = uploadStore;
        this.remoteFetcher = remoteFetcher;
        this.prober = prober;
        this.options = options;
    }

    /**
     * Resolves each distinct source once. Fails on the first source that cannot be used.
     */
    async resolveAll(spec: CompositionSpec): Promise<ResolvedMediaSet> {
        const roles = collectRoles(spec);
        const resolved: ResolvedMediaSet = new Map();

        for (const [source, sourceRoles] of roles) {
            const media = await this.resolveSource(source);
            for (const role of sourceRoles) {
                if (!ACCEPTED_TYPES[role].includes(media.mediaType)) {
                    throw new ResolutionError(
                        'MediaTypeMismatch',
                        `Source ${source} is ${media.mediaType} but is used as ${role}`,
                        source
                    );
                }
            }
            resolved.set(source, media);
        }

        console.log(`[Resolver] Resolved ${resolved.size} media source(s)`);
        return resolved;
    }

    private async resolveSource(source: string): Promise<ResolvedMedia> {
        if (REMOTE_SOURCE.test(source)) {
            const fetched = await this.remoteFetcher.fetch(source, {
                maxBytes: this.options.remoteFetchMaxBytes,
                allowedDomains: this.options.allowedRemoteDomains,
            });
            const mediaType = fetched.mediaType ?? mediaTypeFromExtension(fetched.path);
            if (!mediaType) {
                throw new ResolutionError('UnreadableMedia', `Cannot tell the media type of ${source}`, source);
            }
            return this.describe(source, fetched.path, mediaType, fetched.sizeBytes, 'remote');
        }

        const upload = await this.uploadStore.resolve(source);
        return this.describe(source, upload.path, upload.mediaType, upload.sizeBytes, 'upload');
    }

    private async describe(
        source: string,
        filePath: string,
        mediaType: StoredMediaType,
        sizeBytes: number,
        origin: ResolvedMedia['origin']
    ): Promise<ResolvedMedia> {
        const durationSeconds = mediaType === 'image'
            ? null
            : await this.prober.probeDurationSeconds(filePath);
        return { source, path: filePath, mediaType, sizeBytes, durationSeconds, origin };
    }
}

function collectRoles(spec: CompositionSpec): Map<string, Set<ReferenceRole>> {
    const roles = new Map<string, Set<ReferenceRole>>();
    const add = (source: string, role: ReferenceRole) => {
        const existing = roles.get(source);
        if (existing) {
            existing.add(role);
        } else {
            roles.set(source, new Set([role]));
        }
    };

    for (const scene of spec.scenes) {
        add(scene.media.source, scene.media.type);
        if (scene.audio) {
            add(scene.audio.source, 'audio');
        }
    }
    if (spec.global_audio.background_music) {
        add(spec.global_audio.background_music.source, 'audio');
    }
    if (spec.watermark) {
        add(spec.watermark, 'watermark');
    }
    return roles;
}
