import { FinanceService, amortizedPayment } from '../../src/services/finance.service';
import { ValidationError } from '../../src/utils/errors';

describe('FinanceService', () => {
  const service = new FinanceService();

  describe('amortizedPayment', () => {
    it('should apply the standard amortization formula', () => {
      expect(amortizedPayment(160000, 4.9, 60)).toBeCloseTo(3012.0726, 4);
    });

    it('should divide evenly when the rate is zero', () => {
      expect(amortizedPayment(12000, 0, 48)).toBe(250);
    });
  });

  describe('hirePurchase', () => {
    it('should quote a £200k car with 20% deposit at 4.9% over 60 months', () => {
      const quote = service.hirePurchase({ price: 200000, deposit: 40000, annualRatePercent: 4.9, termMonths: 60 });

      expect(quote.productName).toBe('Hire Purchase');
      expect(quote.deposit).toBe(40000);
      expect(quote.monthlyPayment).toBeCloseTo(3012.07, 2);
      expect(quote.totalCost).toBeCloseTo(40000 + quote.monthlyPayment * 60, 6);
      expect(quote.totalCost).toBeCloseTo(220724.35, 2);
      expect(quote.totalInterest).toBeCloseTo(20724.35, 2);
      expect(quote.finalPayment).toBeUndefined();
    });

    it('should use the product defaults when only a price is given', () => {
      const quote = service.hirePurchase({ price: 200000 });

      expect(quote.annualRatePercent).toBe(4.9);
      expect(quote.termMonths).toBe(60);
      expect(quote.deposit).toBe(40000);
    });
  });

  describe('pcp', () => {
    it('should add straight-line depreciation to a simple interest charge', () => {
      const quote = service.pcp({ price: 100000 });

      // (100000 - 50000) / 36 + (100000 - 20000) * 3.9 / 100 / 12
      expect(quote.monthlyPayment).toBeCloseTo(50000 / 36 + 260, 8);
      expect(quote.finalPayment).toBe(50000);
      expect(quote.deposit).toBe(20000);
      expect(quote.totalCost).toBeCloseTo(79360, 6);
      expect(quote.totalInterest).toBeCloseTo(9360, 6);
      expect(quote.keyFeatures[0]).toBe('Mileage limit: 30,000 miles');
    });
  });

  describe('lease', () => {
    it('should charge depreciation plus rent on price and residual', () => {
      const quote = service.lease({ price: 100000 });

      expect(quote.monthlyPayment).toBeCloseTo(2005, 8);
      expect(quote.deposit).toBe(10000);
      expect(quote.totalCost).toBeCloseTo(72180, 6);
      expect(quote.totalInterest).toBeCloseTo(12180, 6);
      expect(quote.finalPayment).toBeUndefined();
    });
  });

  describe('bespoke', () => {
    it('should have no final payment without a balloon', () => {
      const quote = service.bespoke({ price: 100000 });

      expect(quote.deposit).toBe(25000);
      expect(quote.monthlyPayment).toBeCloseTo(1311.3035, 4);
      expect(quote.finalPayment).toBeUndefined();
    });

    it('should finance the price less deposit and balloon', () => {
      const quote = service.bespoke({ price: 100000, deposit: 25000, balloon: 20000, annualRatePercent: 1.9, termMonths: 48 });

      expect(quote.monthlyPayment).toBeCloseTo(amortizedPayment(55000, 1.9, 48), 10);
      expect(quote.finalPayment).toBe(20000);
      expect(quote.totalCost).toBeCloseTo(25000 + quote.monthlyPayment * 48 + 20000, 6);
    });
  });

  describe('zero-rate law', () => {
    const price = 60000;
    const term = 24;

    it('should give price/term for hire purchase with no deposit', () => {
      expect(service.hirePurchase({ price, deposit: 0, annualRatePercent: 0, termMonths: term }).monthlyPayment).toBe(2500);
    });

    it('should give price/term for pcp with no deposit or residual', () => {
      expect(
        service.pcp({ price, deposit: 0, residualValue: 0, annualRatePercent: 0, termMonths: term }).monthlyPayment
      ).toBe(2500);
    });

    it('should give price/term for a lease with no residual', () => {
      expect(service.lease({ price, residualValue: 0, annualRatePercent: 0, termMonths: term }).monthlyPayment).toBe(2500);
    });

    it('should give price/term for bespoke with no deposit or balloon', () => {
      expect(
        service.bespoke({ price, deposit: 0, balloon: 0, annualRatePercent: 0, termMonths: term }).monthlyPayment
      ).toBe(2500);
    });
  });

  describe('total cost identity', () => {
    const cases = [
      { price: 45000, deposit: 5000, rate: 7.5, term: 36, balloon: 10000 },
      { price: 250000, deposit: 100000, rate: 2.1, term: 72, balloon: 0 },
      { price: 9999, deposit: 1, rate: 19.9, term: 12, balloon: 3000 },
    ];

    it.each(cases)('should hold for hire purchase and bespoke at %o', ({ price, deposit, rate, term, balloon }) => {
      const hp = service.hirePurchase({ price, deposit, annualRatePercent: rate, termMonths: term });
      expect(hp.totalCost).toBeCloseTo(hp.monthlyPayment * term + deposit, 6);

      const bespoke = service.bespoke({ price, deposit, balloon, annualRatePercent: rate, termMonths: term });
      expect(bespoke.totalCost).toBeCloseTo(bespoke.monthlyPayment * term + deposit + balloon, 6);
    });
  });

  describe('compareAll', () => {
    it('should return every product in insertion order', () => {
      const quotes = service.compareAll({ price: 150000 });

      expect(Object.keys(quotes)).toEqual(['hp', 'pcp', 'lease', 'bespoke']);
      expect(quotes.hp.termMonths).toBe(36);
      expect(quotes.lease.termMonths).toBe(36);
    });

    it('should format a side-by-side summary', () => {
      const summary = service.formatComparison(service.compareAll({ price: 150000 }));

      expect(summary.split('\n\n')).toHaveLength(4);
      expect(summary.startsWith('Hire Purchase\n')).toBe(true);
    });
  });

  describe('quote', () => {
    it('should dispatch to the calculator for the product', () => {
      expect(service.quote('pcp', 100000).productName).toBe('Personal Contract Purchase');
      expect(service.quote('lease', 100000).productName).toBe('Car Lease');
    });
  });

  describe('affordablePrice', () => {
    it('should invert the amortization formula', () => {
      const monthly = amortizedPayment(160000, 4.9, 60);
      expect(service.affordablePrice(monthly, 4.9, 60, 40000)).toBeCloseTo(200000, 6);
    });

    it('should multiply out at zero rate', () => {
      expect(service.affordablePrice(1000, 0, 36, 5000)).toBe(41000);
    });
  });

  describe('estimateInsurance', () => {
    it('should use the make rate for an experienced driver', () => {
      const estimate = service.estimateInsurance('Ferrari', 200000);

      expect(estimate.annualCost).toBe(4900);
      expect(estimate.monthlyCost).toBe(408.33);
      expect(estimate.baseRatePercent).toBe(3.5);
    });

    it('should load young drivers with claims', () => {
      const estimate = service.estimateInsurance('ferrari', 200000, 22, 5, 2);

      expect(estimate.factors).toEqual({ age: 1.8, experience: 0.9, claims: 1.3 });
      expect(estimate.annualCost).toBe(14742);
    });
  });

  describe('validation', () => {
    it('should reject a non-positive price', () => {
      expect(() => service.hirePurchase({ price: 0 })).toThrow(ValidationError);
    });

    it('should reject a negative rate', () => {
      expect(() => service.pcp({ price: 50000, annualRatePercent: -1 })).toThrow('Annual rate cannot be negative');
    });

    it('should reject a deposit at or above the price', () => {
      expect(() => service.hirePurchase({ price: 50000, deposit: 50000 })).toThrow(
        'Deposit must be between 0 and the vehicle price'
      );
    });

    it('should reject a fractional term', () => {
      expect(() => service.lease({ price: 50000, termMonths: 12.5 })).toThrow(ValidationError);
    });
  });
});
