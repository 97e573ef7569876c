import { Router, Request, Response, NextFunction } from 'express';
import path from 'path';
import { CONTENT_TYPES, MEDIA_URL_PREFIX } from '../config/constants';
import type { ConversionRecord } from '../models/ConversionRecord';
import type { ConversionService } from '../services/ConversionService';
import { ValidationError } from '../utils/errors';

export interface ConversionView extends ConversionRecord {
  audio_url: string | null;
}

export function toView(record: ConversionRecord, publicBaseUrl: string): ConversionView {
  return {
    ...record,
    audio_url: record.audio_path ? `${publicBaseUrl}${MEDIA_URL_PREFIX}/${record.audio_path}` : null
  };
}

function parseId(raw: string): number {
  const id = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid conversion id '${raw}'`, [
      { field: 'id', message: 'Must be a positive integer' }
    ]);
  }
  return id;
}

export function createConversionRouter(service: ConversionService, publicBaseUrl: string): Router {
  const router = Router();

  /**
   * GET /api/conversions
   * List conversions, newest first
   */
  router.get('/conversions', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const records = await service.list();
      res.json({
        count: records.length,
        conversions: records.map((r) => toView(r, publicBaseUrl))
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/conversions
   * Body: { text, language?, filename? }
   */
  router.post('/conversions', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await service.create(req.body);
      res.status(201).location(`${req.baseUrl}/conversions/${record.id}`).json(toView(record, publicBaseUrl));
    } catch (error) {
      next(error);
    }
  });

  router.get('/conversions/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await service.get(parseId(req.params.id));
      res.json(toView(record, publicBaseUrl));
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /api/conversions/:id
   * Body: { text?, language? } - re-synthesizes the audio
   */
  router.put('/conversions/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const record = await service.update(parseId(req.params.id), req.body);
      res.json(toView(record, publicBaseUrl));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/conversions/:id
   * Removes the record; the audio file is kept
   */
  router.delete('/conversions/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await service.delete(parseId(req.params.id));
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/download-voice/:filename
   * Audio as an attachment named after the record's filename
   */
  router.get('/download-voice/:filename', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { record, filePath } = await service.getAudio(req.params.filename);
      const extension = path.extname(filePath).slice(1);

      res.attachment(`${record.filename}.${extension}`);
      res.set('Content-Type', CONTENT_TYPES[extension] ?? 'application/octet-stream');
      res.sendFile(filePath, (error) => {
        if (error) {
          next(error);
        }
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
