import { Valuation } from '../types/records';

const BASE_VALUE = 200000;
const AGE_DEPRECIATION_PER_YEAR = 0.1;
const MILEAGE_DEPRECIATION_PER_10K = 0.03;
const TRADE_IN_FACTOR = 0.7;
const PRIVATE_SALE_UPLIFT = 1.2;
const RETAIL_UPLIFT = 1.15;

export class ValuationService {
  constructor(
    private readonly baseValue: number = BASE_VALUE,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Rule-of-thumb market estimate: 10% per year of age, 3% per 10k miles,
   * trade-in at 70% of the depreciated base. Each factor floors at zero.
   */
  estimate(year: number, mileage: number): Valuation {
    const age = Math.max(0, this.clock().getFullYear() - year);
    const ageFactor = Math.max(0, 1 - age * AGE_DEPRECIATION_PER_YEAR);
    const mileageFactor = Math.max(0, 1 - (Math.max(0, mileage) / 10000) * MILEAGE_DEPRECIATION_PER_10K);

    const tradeIn = Math.trunc(this.baseValue * ageFactor * mileageFactor * TRADE_IN_FACTOR);
    const privateSale = Math.trunc(tradeIn * PRIVATE_SALE_UPLIFT);
    const retail = Math.trunc(privateSale * RETAIL_UPLIFT);

    return { tradeIn, privateSale, retail };
  }
}
