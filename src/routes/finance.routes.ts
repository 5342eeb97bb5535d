import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { FinanceService } from '../services/finance.service';
import { FinanceQuote } from '../types/finance';
import { parseInput } from '../utils/validation';

const price = z.number().positive();
const rate = z.number().min(0).max(100).optional();
const term = z.number().int().positive().max(120).optional();
const amount = z.number().min(0).optional();

const quoteSchema = z.discriminatedUnion('product', [
  z.object({ product: z.literal('hp'), price, annualRatePercent: rate, termMonths: term, deposit: amount }),
  z.object({
    product: z.literal('pcp'),
    price,
    annualRatePercent: rate,
    termMonths: term,
    deposit: amount,
    residualValue: amount,
    annualMileage: z.number().int().positive().optional(),
  }),
  z.object({
    product: z.literal('lease'),
    price,
    annualRatePercent: rate,
    termMonths: term,
    residualValue: amount,
    initialRental: amount,
    annualMileage: z.number().int().positive().optional(),
    excessMileageCost: amount,
  }),
  z.object({ product: z.literal('bespoke'), price, annualRatePercent: rate, termMonths: term, deposit: amount, balloon: amount }),
]);

const compareSchema = z.object({
  price,
  termMonths: term,
  annualMileage: z.number().int().positive().optional(),
});

const affordabilitySchema = z.object({
  monthlyBudget: z.number().positive(),
  annualRatePercent: z.number().min(0).max(100),
  termMonths: z.number().int().positive().max(120),
  deposit: z.number().min(0).default(0),
});

const insuranceSchema = z.object({
  make: z.string().min(1),
  price,
  driverAge: z.number().int().min(17).max(100).optional(),
  yearsExperience: z.number().int().min(0).optional(),
  claims: z.number().int().min(0).optional(),
});

export function createFinanceRouter(finance: FinanceService): Router {
  const router = Router();

  router.post('/quote', (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseInput(quoteSchema, req.body);

      let quote: FinanceQuote;
      switch (input.product) {
        case 'hp':
          quote = finance.hirePurchase(input);
          break;
        case 'pcp':
          quote = finance.pcp(input);
          break;
        case 'lease':
          quote = finance.lease(input);
          break;
        case 'bespoke':
          quote = finance.bespoke(input);
          break;
      }

      res.json({ success: true, quote, summary: finance.formatQuote(quote) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/compare', (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseInput(compareSchema, req.body);
      const quotes = finance.compareAll(input);
      res.json({ success: true, quotes, summary: finance.formatComparison(quotes) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/affordability', (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseInput(affordabilitySchema, req.body);
      const maxPrice = finance.affordablePrice(input.monthlyBudget, input.annualRatePercent, input.termMonths, input.deposit);
      res.json({ success: true, maxPrice: Math.floor(maxPrice) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/insurance', (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseInput(insuranceSchema, req.body);
      const estimate = finance.estimateInsurance(
        input.make,
        input.price,
        input.driverAge,
        input.yearsExperience,
        input.claims
      );
      res.json({ success: true, estimate });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
