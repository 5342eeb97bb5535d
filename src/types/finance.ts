export type FinanceProduct = 'hp' | 'pcp' | 'lease' | 'bespoke';

export type FinanceType = FinanceProduct | 'cash';

export interface FinanceQuote {
  product: FinanceProduct;
  productName: string;
  annualRatePercent: number;
  monthlyPayment: number;
  totalCost: number;
  termMonths: number;
  deposit: number;
  finalPayment?: number;
  totalInterest: number;
  provider: string;
  rating: number;
  keyFeatures: string[];
}

export interface HirePurchaseInput {
  price: number;
  annualRatePercent?: number;
  termMonths?: number;
  deposit?: number;
}

export interface PcpInput {
  price: number;
  annualRatePercent?: number;
  termMonths?: number;
  deposit?: number;
  residualValue?: number;
  annualMileage?: number;
}

export interface LeaseInput {
  price: number;
  annualRatePercent?: number;
  termMonths?: number;
  residualValue?: number;
  initialRental?: number;
  annualMileage?: number;
  excessMileageCost?: number;
}

export interface BespokeInput {
  price: number;
  annualRatePercent?: number;
  termMonths?: number;
  deposit?: number;
  balloon?: number;
}

export interface CompareInput {
  price: number;
  termMonths?: number;
  annualMileage?: number;
}

export type QuoteComparison = Record<FinanceProduct, FinanceQuote>;

export interface InsuranceEstimate {
  annualCost: number;
  monthlyCost: number;
  baseRatePercent: number;
  factors: { age: number; experience: number; claims: number };
}
