import { Router } from 'express';
import { z } from 'zod';
import type { SlotStore } from '../../slots/slotStore.js';
import { FormantVectorSchema, formantVector } from '../../types/formant.js';
import { sendError } from './respond.js';

const PutSlotSchema = z.object({
  name: z.string().max(120).optional(),
  vector: FormantVectorSchema,
});

function parseSlot(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

export function createSlotsRouter(store: SlotStore): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    try {
      res.json({ ok: true, slots: await store.listSlots() });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:slot', async (req, res) => {
    const slot = parseSlot(req.params.slot);
    if (slot === null) {
      res.status(400).json({ ok: false, code: 'INVALID_SLOT', message: `Invalid slot '${req.params.slot}'` });
      return;
    }
    try {
      res.json({ ok: true, slot: await store.readSlot(slot) });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.put('/:slot', async (req, res) => {
    const slot = parseSlot(req.params.slot);
    if (slot === null) {
      res.status(400).json({ ok: false, code: 'INVALID_SLOT', message: `Invalid slot '${req.params.slot}'` });
      return;
    }
    const body = PutSlotSchema.safeParse(req.body);
    if (!body.success) {
      const message = body.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      res.status(400).json({ ok: false, code: 'INVALID_BODY', message });
      return;
    }
    try {
      const record = await store.writeSlot(slot, formantVector(body.data.vector), body.data.name);
      res.json({ ok: true, slot: record });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
