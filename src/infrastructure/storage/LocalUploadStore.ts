import fs from 'fs';
import path from 'path';
import { UploadedFile, mediaTypeFromExtension } from '../../domain/entities/MediaAsset';
import { ResolutionError } from '../../domain/errors/CompositionErrors';
import { IUploadStore } from '../../domain/ports/IUploadStore';

const FILE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Reads files saved by the upload endpoint as `<uploadDir>/<fileId>.<ext>`.
 */
export class LocalUploadStore implements IUploadStore {
    private readonly uploadDir: string;

    constructor(uploadDir: string) {
        this.uploadDir = path.resolve(uploadDir);
    }

    async resolve(fileId: string): Promise<UploadedFile> {
        // Ids never contain path separators or dots
        if (!FILE_ID_PATTERN.test(fileId)) {
            throw new ResolutionError('NotFound', `File not found: ${fileId}`, fileId);
        }

        let entries: string[];
        try {
            entries = await fs.promises.readdir(this.uploadDir);
        } catch (error) {
            console.error(`[Uploads] Cannot read upload directory ${this.uploadDir}:`, error);
            throw new ResolutionError('NotFound', `File not found: ${fileId}`, fileId);
        }

        const fileName = entries.find((entry) => path.parse(entry).name === fileId);
        if (!fileName) {
            throw new ResolutionError('NotFound', `File not found: ${fileId}`, fileId);
        }

        const mediaType = mediaTypeFromExtension(fileName);
        if (!mediaType) {
            throw new ResolutionError('UnreadableMedia', `Unsupported file type: ${fileName}`, fileId);
        }

        const filePath = path.join(this.uploadDir, fileName);
        const stats = await fs.promises.stat(filePath);
        return { fileId, path: filePath, mediaType, sizeBytes: stats.size };
    }
}
