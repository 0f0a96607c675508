import express, { Router } from 'express';
import type { FingerprintConstants } from '../../config.js';
import { startAnalysis } from '../../analysis/AnalysisTask.js';
import { decodeWav } from '../../analysis/wavInput.js';
import { sendError } from './respond.js';

const MAX_WAV_BYTES = '25mb';

/** POST a raw WAV body, get its fingerprint back. */
export function createAnalyzeRouter(constants: FingerprintConstants): Router {
  const router = Router();

  router.post(
    '/',
    express.raw({ type: ['audio/wav', 'audio/wave', 'audio/x-wav', 'application/octet-stream'], limit: MAX_WAV_BYTES }),
    async (req, res) => {
      try {
        if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
          res.status(400).json({ ok: false, code: 'MISSING_BODY', message: 'Send the WAV file as the request body (Content-Type: audio/wav)' });
          return;
        }
        const wav = decodeWav(req.body);
        const task = startAnalysis(wav.samples, wav.sampleRate, { constants });
        // Client gone: stop burning CPU on its clip
        res.on('close', () => {
          if (!res.writableFinished) task.cancel();
        });
        const fingerprint = await task.promise;
        console.log(
          `[analyze] ${wav.sampleRate} Hz, ${fingerprint.metadata.durationSec.toFixed(2)}s -> ` +
            `(${fingerprint.pad.x.toFixed(2)}, ${fingerprint.pad.y.toFixed(2)}) ${fingerprint.confidence}`
        );
        res.json({ ok: true, bitDepth: wav.bitDepth, fingerprint });
      } catch (err) {
        sendError(res, err);
      }
    }
  );

  return router;
}
