import { StoredMediaType } from '../entities/MediaAsset';

export interface RemoteFetchOptions {
    maxBytes: number;
    /** Empty list allows every host */
    allowedDomains: string[];
}

export interface FetchedFile {
    path: string;
    sizeBytes: number;
    /** From the file extension or Content-Type, null when neither says */
    mediaType: StoredMediaType | null;
}

/**
 * IRemoteFetcher - Port for downloading remote media into local storage.
 */
export interface IRemoteFetcher {
    /**
     * Downloads a URL, reusing an earlier download of the same URL.
     * @throws ResolutionError(UnreachableSource | SizeLimitExceeded | DomainNotAllowed)
     */
    fetch(url: string, options: RemoteFetchOptions): Promise<FetchedFile>;
}
