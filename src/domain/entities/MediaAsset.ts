export type StoredMediaType = 'image' | 'video' | 'audio';

/**
 * A file held by the upload store.
 */
export interface UploadedFile {
    fileId: string;
    path: string;
    mediaType: StoredMediaType;
    sizeBytes: number;
}

/**
 * A media source after resolution: a local file with a known type and size.
 */
export interface ResolvedMedia {
    /** The source string exactly as written in the composition */
    source: string;
    path: string;
    mediaType: StoredMediaType;
    sizeBytes: number;
    /** Probed length for video and audio, null for images */
    durationSeconds: number | null;
    origin: 'upload' | 'remote';
}

export type ResolvedMediaSet = Map<string, ResolvedMedia>;

/**
 * Media type from a file extension; null when the extension is not a supported media file.
 */
export function mediaTypeFromExtension(fileName: string): StoredMediaType | null {
    const dot = fileName.lastIndexOf('.');
    if (dot < 0) {
        return null;
    }
    const ext = fileName.substring(dot + 1).toLowerCase();
    return EXTENSION_TYPES[ext] ?? null;
}

const EXTENSION_TYPES: Record<string, StoredMediaType> = {
    jpg: 'image',
    jpeg: 'image',
    png: 'image',
    gif: 'image',
    webp: 'image',
    bmp: 'image',
    tiff: 'image',
    mp4: 'video',
    mov: 'video',
    avi: 'video',
    mkv: 'video',
    webm: 'video',
    flv: 'video',
    wmv: 'video',
    m4v: 'video',
    mp3: 'audio',
    wav: 'audio',
    m4a: 'audio',
    aac: 'audio',
    ogg: 'audio',
    flac: 'audio',
    wma: 'audio',
};

/**
 * Media type from an HTTP Content-Type header.
 */
export function mediaTypeFromMime(contentType: string | undefined): StoredMediaType | null {
    if (!contentType) {
        return null;
    }
    const major = contentType.split('/')[0].trim().toLowerCase();
    if (major === 'image' || major === 'video' || major === 'audio') {
        return major;
    }
    return null;
}

const MIME_EXTENSIONS: Record<string, string> = {
    'image/jpeg': 'jpg',
    'image/png': 'png',
    'image/gif': 'gif',
    'image/webp': 'webp',
    'image/bmp': 'bmp',
    'video/mp4': 'mp4',
    'video/quicktime': 'mov',
    'video/x-msvideo': 'avi',
    'video/webm': 'webm',
    'video/x-matroska': 'mkv',
    'audio/mpeg': 'mp3',
    'audio/wav': 'wav',
    'audio/x-wav': 'wav',
    'audio/mp4': 'm4a',
    'audio/aac': 'aac',
    'audio/ogg': 'ogg',
    'audio/flac': 'flac',
};

/**
 * File extension (without dot) for a Content-Type, null when unknown.
 */
export function extensionFromMime(contentType: string | undefined): string | null {
    if (!contentType) {
        return null;
    }
    const mime = contentType.split(';')[0].trim().toLowerCase();
    return MIME_EXTENSIONS[mime] ?? null;
}
