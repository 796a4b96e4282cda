import fs from 'fs';
import os from 'os';
import path from 'path';
import { ResolutionError } from '../../../src/domain/errors/CompositionErrors';
import { LocalUploadStore } from '../../../src/infrastructure/storage/LocalUploadStore';
import { captureAsyncError } from '../../helpers/compositions';

describe('LocalUploadStore', () => {
    let uploadDir: string;
    let store: LocalUploadStore;

    beforeEach(() => {
        uploadDir = fs.mkdtempSync(path.join(os.tmpdir(), 'uploads-test-'));
        fs.writeFileSync(path.join(uploadDir, 'abc123.mp4'), 'video');
        fs.writeFileSync(path.join(uploadDir, 'logo_1.PNG'), 'png');
        fs.writeFileSync(path.join(uploadDir, 'notes.txt'), 'text');
        store = new LocalUploadStore(uploadDir);
    });

    afterEach(() => {
        fs.rmSync(uploadDir, { recursive: true, force: true });
    });

    it('should find an upload by its id regardless of extension', async () => {
        const file = await store.resolve('abc123');

        expect(file).toEqual({
            fileId: 'abc123',
            path: path.join(uploadDir, 'abc123.mp4'),
            mediaType: 'video',
            sizeBytes: 5,
        });
    });

    it('should read extensions case-insensitively', async () => {
        expect((await store.resolve('logo_1')).mediaType).toBe('image');
    });

    it('should report an unknown id as not found', async () => {
        const error = await captureAsyncError(() => store.resolve('missing'));

        expect(error).toBeInstanceOf(ResolutionError);
        expect(error).toMatchObject({ kind: 'NotFound', message: 'File not found: missing', source: 'missing' });
    });

    it('should never look outside the upload directory', async () => {
        const error = await captureAsyncError(() => store.resolve('../abc123'));

        expect(error).toMatchObject({ kind: 'NotFound' });
    });

    it('should reject files that are not media', async () => {
        const error = await captureAsyncError(() => store.resolve('notes'));

        expect(error).toMatchObject({ kind: 'UnreadableMedia', message: 'Unsupported file type: notes.txt' });
    });

    it('should report not found when the directory does not exist', async () => {
        const missingDir = new LocalUploadStore(path.join(uploadDir, 'nope'));

        const error = await captureAsyncError(() => missingDir.resolve('abc123'));

        expect(error).toMatchObject({ kind: 'NotFound' });
    });
});
