import { Domain } from './session';
import { FinanceType } from './finance';

export interface VehicleFactSignal {
  type: 'vehicle';
  make?: string;
  model?: string;
  year?: number;
  mileage?: number;
  color?: string;
}

export interface ContactFactSignal {
  type: 'contact';
  name?: string;
  email?: string;
  phone?: string;
  postcode?: string;
}

export interface OptionChoiceSignal {
  type: 'choice';
  index: number;
}

export interface DateTimeSignal {
  type: 'datetime';
  /** ISO-8601 with offset */
  value: string;
  text: string;
}

export interface ConfirmationSignal {
  type: 'confirmation';
  accepted: boolean;
}

export interface DomainHintSignal {
  type: 'domain';
  domain: Domain;
}

export interface ServiceRequestSignal {
  type: 'service';
  serviceType: string;
  description: string;
}

export interface FinancePreferenceSignal {
  type: 'finance';
  financeType: FinanceType;
}

export interface BudgetSignal {
  type: 'budget';
  maxPrice: number;
}

export interface SaleReasonSignal {
  type: 'sale_reason';
  reason: string;
}

export type Signal =
  | VehicleFactSignal
  | ContactFactSignal
  | OptionChoiceSignal
  | DateTimeSignal
  | ConfirmationSignal
  | DomainHintSignal
  | ServiceRequestSignal
  | FinancePreferenceSignal
  | BudgetSignal
  | SaleReasonSignal;

