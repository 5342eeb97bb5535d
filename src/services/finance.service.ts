import {
  BespokeInput,
  CompareInput,
  FinanceProduct,
  FinanceQuote,
  HirePurchaseInput,
  InsuranceEstimate,
  LeaseInput,
  PcpInput,
  QuoteComparison,
} from '../types/finance';
import { ValidationError } from '../utils/errors';
import { formatGBP, formatNumber, roundTo } from '../utils/format';

export const FINANCE_DEFAULTS = {
  hp: { annualRatePercent: 4.9, termMonths: 60, depositPercent: 20 },
  pcp: { annualRatePercent: 3.9, termMonths: 36, depositPercent: 20, residualPercent: 50, annualMileage: 10000 },
  lease: {
    annualRatePercent: 2.9,
    termMonths: 36,
    residualPercent: 40,
    initialRentalPercent: 10,
    annualMileage: 12000,
    excessMileageCost: 0.35,
  },
  bespoke: { annualRatePercent: 1.9, termMonths: 60, depositPercent: 25, balloonPercent: 0 },
} as const;

const INSURANCE_RATES: Record<string, number> = {
  ferrari: 0.035,
  lamborghini: 0.032,
  porsche: 0.025,
  mclaren: 0.038,
  'aston martin': 0.028,
};
const DEFAULT_INSURANCE_RATE = 0.03;

/**
 * Standard amortization: M = P·r·(1+r)^n / ((1+r)^n − 1), r = annualRate/12/100.
 * A zero rate degenerates to P/n.
 */
export function amortizedPayment(principal: number, annualRatePercent: number, months: number): number {
  if (annualRatePercent === 0) return principal / months;

  const r = annualRatePercent / 12 / 100;
  const growth = Math.pow(1 + r, months);
  return (principal * r * growth) / (growth - 1);
}

function percentOf(price: number, percent: number): number {
  return price * (percent / 100);
}

function assertInputs(price: number, annualRatePercent: number, termMonths: number): void {
  if (!Number.isFinite(price) || price <= 0) {
    throw new ValidationError('Vehicle price must be a positive number');
  }
  if (!Number.isFinite(annualRatePercent) || annualRatePercent < 0) {
    throw new ValidationError('Annual rate cannot be negative');
  }
  if (!Number.isInteger(termMonths) || termMonths <= 0) {
    throw new ValidationError('Term must be a positive whole number of months');
  }
}

function assertPortion(label: string, amount: number, price: number): void {
  if (!Number.isFinite(amount) || amount < 0 || amount >= price) {
    throw new ValidationError(`${label} must be between 0 and the vehicle price`);
  }
}

export class FinanceService {
  hirePurchase(input: HirePurchaseInput): FinanceQuote {
    const defaults = FINANCE_DEFAULTS.hp;
    const annualRatePercent = input.annualRatePercent ?? defaults.annualRatePercent;
    const termMonths = input.termMonths ?? defaults.termMonths;
    assertInputs(input.price, annualRatePercent, termMonths);

    const deposit = input.deposit ?? percentOf(input.price, defaults.depositPercent);
    assertPortion('Deposit', deposit, input.price);

    const monthlyPayment = amortizedPayment(input.price - deposit, annualRatePercent, termMonths);
    const totalCost = monthlyPayment * termMonths + deposit;

    return {
      product: 'hp',
      productName: 'Hire Purchase',
      annualRatePercent,
      monthlyPayment,
      totalCost,
      termMonths,
      deposit,
      totalInterest: totalCost - input.price,
      provider: 'Panel lenders',
      rating: 4.2,
      keyFeatures: [
        'Own the car at end of term',
        'Fixed monthly payments',
        'No mileage restrictions',
        'Full maintenance flexibility',
      ],
    };
  }

  /**
   * Depreciation and interest are charged separately and added:
   * (price − residual)/n + (price − deposit)·rate/100/12. The residual is the optional final payment.
   */
  pcp(input: PcpInput): FinanceQuote {
    const defaults = FINANCE_DEFAULTS.pcp;
    const annualRatePercent = input.annualRatePercent ?? defaults.annualRatePercent;
    const termMonths = input.termMonths ?? defaults.termMonths;
    assertInputs(input.price, annualRatePercent, termMonths);

    const deposit = input.deposit ?? percentOf(input.price, defaults.depositPercent);
    const residualValue = input.residualValue ?? percentOf(input.price, defaults.residualPercent);
    assertPortion('Deposit', deposit, input.price);
    assertPortion('Residual value', residualValue, input.price);

    const depreciation = (input.price - residualValue) / termMonths;
    const interest = ((input.price - deposit) * annualRatePercent) / 100 / 12;
    const monthlyPayment = depreciation + interest;
    const annualMileage = input.annualMileage ?? defaults.annualMileage;

    return {
      product: 'pcp',
      productName: 'Personal Contract Purchase',
      annualRatePercent,
      monthlyPayment,
      totalCost: deposit + monthlyPayment * termMonths,
      termMonths,
      deposit,
      finalPayment: residualValue,
      totalInterest: interest * termMonths,
      provider: 'Panel lenders',
      rating: 4.7,
      keyFeatures: [
        `Mileage limit: ${formatNumber(annualMileage * Math.floor(termMonths / 12))} miles`,
        'Return the car at end of term (no residual risk)',
        'Lower monthly payments than HP',
        'Warranty typically included',
      ],
    };
  }

  /** Straight-line depreciation plus a money-factor rent charge on (price + residual). */
  lease(input: LeaseInput): FinanceQuote {
    const defaults = FINANCE_DEFAULTS.lease;
    const annualRatePercent = input.annualRatePercent ?? defaults.annualRatePercent;
    const termMonths = input.termMonths ?? defaults.termMonths;
    assertInputs(input.price, annualRatePercent, termMonths);

    const residualValue = input.residualValue ?? percentOf(input.price, defaults.residualPercent);
    const initialRental = input.initialRental ?? percentOf(input.price, defaults.initialRentalPercent);
    assertPortion('Residual value', residualValue, input.price);
    assertPortion('Initial rental', initialRental, input.price);

    const depreciation = (input.price - residualValue) / termMonths;
    const moneyFactor = annualRatePercent / 100 / 12;
    const rentCharge = moneyFactor * (input.price + residualValue);
    const monthlyPayment = depreciation + rentCharge;
    const annualMileage = input.annualMileage ?? defaults.annualMileage;
    const excessMileageCost = input.excessMileageCost ?? defaults.excessMileageCost;

    return {
      product: 'lease',
      productName: 'Car Lease',
      annualRatePercent,
      monthlyPayment,
      totalCost: monthlyPayment * termMonths,
      termMonths,
      deposit: initialRental,
      totalInterest: rentCharge * termMonths,
      provider: 'Lease partner',
      rating: 4.5,
      keyFeatures: [
        `Annual mileage: ${formatNumber(annualMileage)} miles`,
        `Excess mileage: ${formatGBP(excessMileageCost)}/mile`,
        'Warranty included',
        'Maintenance typically included',
        'Return at end of term',
      ],
    };
  }

  bespoke(input: BespokeInput): FinanceQuote {
    const defaults = FINANCE_DEFAULTS.bespoke;
    const annualRatePercent = input.annualRatePercent ?? defaults.annualRatePercent;
    const termMonths = input.termMonths ?? defaults.termMonths;
    assertInputs(input.price, annualRatePercent, termMonths);

    const deposit = input.deposit ?? percentOf(input.price, defaults.depositPercent);
    const balloon = input.balloon ?? percentOf(input.price, defaults.balloonPercent);
    assertPortion('Deposit', deposit, input.price);
    assertPortion('Deposit plus balloon', deposit + balloon, input.price);

    const financed = input.price - deposit - balloon;
    const monthlyPayment = amortizedPayment(financed, annualRatePercent, termMonths);

    const quote: FinanceQuote = {
      product: 'bespoke',
      productName: 'Bespoke Finance',
      annualRatePercent,
      monthlyPayment,
      totalCost: deposit + monthlyPayment * termMonths + balloon,
      termMonths,
      deposit,
      totalInterest: monthlyPayment * termMonths - financed,
      provider: 'Private banking partner',
      rating: 4.8,
      keyFeatures: [
        'Low headline rates',
        'Flexible payment structures',
        'No mileage restrictions',
        'Dedicated relationship manager',
      ],
    };
    if (balloon > 0) quote.finalPayment = balloon;
    return quote;
  }

  quote(product: FinanceProduct, price: number, termMonths?: number): FinanceQuote {
    switch (product) {
      case 'hp':
        return this.hirePurchase({ price, termMonths });
      case 'pcp':
        return this.pcp({ price, termMonths });
      case 'lease':
        return this.lease({ price, termMonths });
      case 'bespoke':
        return this.bespoke({ price, termMonths });
    }
  }

  /** Every product on shared inputs, keyed by product in hp, pcp, lease, bespoke order. */
  compareAll(input: CompareInput): QuoteComparison {
    const termMonths = input.termMonths ?? 36;
    const annualMileage = input.annualMileage ?? 10000;

    return {
      hp: this.hirePurchase({ price: input.price, termMonths }),
      pcp: this.pcp({ price: input.price, termMonths, annualMileage }),
      lease: this.lease({ price: input.price, termMonths, annualMileage }),
      bespoke: this.bespoke({ price: input.price, termMonths }),
    };
  }

  /** Largest vehicle price a monthly budget supports on a standard amortized loan. */
  affordablePrice(monthlyBudget: number, annualRatePercent: number, termMonths: number, deposit = 0): number {
    if (!Number.isFinite(monthlyBudget) || monthlyBudget <= 0) {
      throw new ValidationError('Monthly budget must be a positive number');
    }
    if (deposit < 0) {
      throw new ValidationError('Deposit cannot be negative');
    }
    assertInputs(1, annualRatePercent, termMonths);

    if (annualRatePercent === 0) return monthlyBudget * termMonths + deposit;

    const r = annualRatePercent / 12 / 100;
    const growth = Math.pow(1 + r, termMonths);
    return (monthlyBudget * (growth - 1)) / (r * growth) + deposit;
  }

  estimateInsurance(
    make: string,
    price: number,
    driverAge = 45,
    yearsExperience = 20,
    claims = 0
  ): InsuranceEstimate {
    if (!Number.isFinite(price) || price <= 0) {
      throw new ValidationError('Vehicle price must be a positive number');
    }

    const baseRate = INSURANCE_RATES[make.trim().toLowerCase()] ?? DEFAULT_INSURANCE_RATE;

    let age = 1.0;
    if (driverAge < 25) age = 1.8;
    else if (driverAge < 30) age = 1.5;
    else if (driverAge < 35) age = 1.2;

    const experience = Math.max(0.7, 1.0 - yearsExperience * 0.02);
    const claimsFactor = 1.0 + claims * 0.15;
    const annualCost = price * baseRate * age * experience * claimsFactor;

    return {
      annualCost: roundTo(annualCost),
      monthlyCost: roundTo(annualCost / 12),
      baseRatePercent: roundTo(baseRate * 100, 1),
      factors: { age, experience: roundTo(experience), claims: roundTo(claimsFactor) },
    };
  }

  formatQuote(quote: FinanceQuote): string {
    const lines = [
      `${quote.productName}`,
      `  Monthly payment: ${formatGBP(quote.monthlyPayment)}`,
      `  Deposit: ${formatGBP(quote.deposit)}`,
      `  APR: ${quote.annualRatePercent}%`,
      `  Term: ${quote.termMonths} months`,
      `  Total cost: ${formatGBP(quote.totalCost)}`,
    ];
    if (quote.finalPayment !== undefined) {
      lines.push(`  Final payment: ${formatGBP(quote.finalPayment)}`);
    }
    return lines.join('\n');
  }

  formatComparison(quotes: QuoteComparison): string {
    return Object.values(quotes)
      .map((quote) => this.formatQuote(quote))
      .join('\n\n');
  }
}
