import fs from 'fs';
import path from 'path';
import { Router } from 'express';
import { ARTIFACT_FILE_PATTERN } from '@shared/utils/slugify';
import { sendError } from '../middleware/errorHandler';

const PPTX_MIME = 'application/vnd.openxmlformats-officedocument.presentationml.presentation';

export function createDownloadRouter(outputDir: string): Router {
    const router = Router();

    router.get('/download/:fileName', (req, res, next) => {
        const { fileName } = req.params;
        // Only names the exporter can produce; rules out traversal and temp files
        if (!ARTIFACT_FILE_PATTERN.test(fileName)) {
            sendError(res, 'validation', `Invalid file name: ${fileName}`);
            return;
        }

        const filePath = path.join(outputDir, fileName);
        if (!fs.existsSync(filePath)) {
            res.status(404).json({ error: 'File not found' });
            return;
        }

        res.type(PPTX_MIME);
        res.download(filePath, fileName, error => {
            if (error) next(error);
        });
    });

    return router;
}
