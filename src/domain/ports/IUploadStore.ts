import { UploadedFile } from '../entities/MediaAsset';

/**
 * IUploadStore - Port for files previously uploaded by users.
 */
export interface IUploadStore {
    /**
     * Looks up an uploaded file.
     * @throws ResolutionError(NotFound) when no file has this id
     */
    resolve(fileId: string): Promise<UploadedFile>;
}
