import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { TransactionService } from '../services/transaction.service';
import { RECORD_STATUSES } from '../types/records';
import { NotFoundError } from '../utils/errors';
import { parseInput } from '../utils/validation';
import { RECORD_ID_PATTERN, kindFromRecordId } from '../utils/recordIds';

const kind = z.enum(['order', 'appointment', 'listing']);

const recordParamsSchema = z
  .object({
    kind,
    id: z.string().regex(RECORD_ID_PATTERN, 'Invalid record id'),
  })
  .refine((params) => kindFromRecordId(params.id) === params.kind, { message: 'Record id does not match kind' });

const statusSchema = z.object({
  status: z.enum(['pending', 'confirmed', 'completed', 'cancelled']),
  note: z.string().max(1000).optional(),
});

const listSchema = z.object({
  email: z.string().email(),
  limit: z.coerce.number().int().positive().max(50).default(10),
});

export function createRecordsRouter(transactions: TransactionService): Router {
  const router = Router();

  router.get('/statuses', (_req: Request, res: Response) => {
    res.json({ success: true, statuses: RECORD_STATUSES });
  });

  router.get('/:kind', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const recordKind = parseInput(kind, req.params.kind);
      const { email, limit } = parseInput(listSchema, req.query);
      const records = await transactions.listByEmail(recordKind, email, limit);
      res.json({ success: true, records });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:kind/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = parseInput(recordParamsSchema, req.params);
      const record = await transactions.getRecord(params.kind, params.id);
      if (!record) {
        throw new NotFoundError('Record not found');
      }
      res.json({ success: true, record, summary: transactions.summaryLines(record) });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:kind/:id/status', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = parseInput(recordParamsSchema, req.params);
      const body = parseInput(statusSchema, req.body);
      const record = await transactions.updateStatus(params.kind, params.id, body.status, body.note);
      res.json({ success: true, record });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
