import { FinanceQuote, FinanceType } from './finance';
import { ServiceProvider, VehicleListing } from './capabilities';
import { Valuation } from './records';

export type Domain = 'acquisition' | 'service' | 'consignment';

export type ActiveDomain = Domain | 'none';

export const ACQUISITION_STAGES = ['vehicle_search', 'vehicle_selection', 'customer_info', 'ready'] as const;
export const SERVICE_STAGES = [
  'vehicle_details',
  'service_type',
  'customer_details',
  'provider_selection',
  'appointment_datetime',
  'ready',
] as const;
export const CONSIGNMENT_STAGES = ['vehicle_details', 'vehicle_condition', 'sale_reason', 'owner_details', 'ready'] as const;

export type AcquisitionStage = (typeof ACQUISITION_STAGES)[number];
export type ServiceStage = (typeof SERVICE_STAGES)[number];
export type ConsignmentStage = (typeof CONSIGNMENT_STAGES)[number];

export type SessionStage = 'greeting' | AcquisitionStage | ServiceStage | ConsignmentStage | 'completed';

/** The single field a stage is currently prompting for; lets the extractor read bare answers. */
export type AwaitedField =
  | 'make'
  | 'model'
  | 'year'
  | 'mileage'
  | 'color'
  | 'service_type'
  | 'sale_reason'
  | 'name'
  | 'email'
  | 'phone'
  | 'postcode'
  | 'choice'
  | 'datetime';

export interface ContactInfo {
  name?: string;
  email?: string;
  phone?: string;
  postcode?: string;
}

export interface VehicleFacts {
  make?: string;
  model?: string;
  year?: number;
  mileage?: number;
  color?: string;
}

export interface SearchCriteria {
  make?: string;
  model?: string;
  minYear?: number;
  maxPrice?: number;
  limit?: number;
}

export interface AcquisitionSlots {
  domain: 'acquisition';
  funnelId: string;
  criteria: SearchCriteria;
  searchKey?: string;
  searchResults: VehicleListing[];
  selectedVehicle?: VehicleListing;
  financeType?: FinanceType;
  financeQuote?: FinanceQuote;
  contact: ContactInfo;
  recordCreated: boolean;
  recordId?: string;
}

export interface ServiceSlots {
  domain: 'service';
  funnelId: string;
  vehicle: VehicleFacts;
  serviceType?: string;
  serviceDescription?: string;
  contact: ContactInfo;
  providersKey?: string;
  providers: ServiceProvider[];
  selectedProvider?: ServiceProvider;
  appointmentDateTime?: string;
  /** Last proposed time that could not be booked, with the next opening when there is one. */
  rejectedDateTime?: { value: string; reason: string; suggestion?: string };
  recordCreated: boolean;
  recordId?: string;
}

export interface ConsignmentSlots {
  domain: 'consignment';
  funnelId: string;
  vehicle: VehicleFacts;
  reasonForSale?: string;
  contact: ContactInfo;
  valuationKey?: string;
  valuation?: Valuation;
  recordCreated: boolean;
  recordId?: string;
}

export type DomainSlots = AcquisitionSlots | ServiceSlots | ConsignmentSlots;

export interface HistoryTurn {
  role: 'user' | 'assistant';
  content: string;
  domain: ActiveDomain;
  stage: SessionStage;
  timestamp: string;
}

export interface SessionState {
  sessionId: string;
  activeDomain: ActiveDomain;
  stage: SessionStage;
  slots: DomainSlots | null;
  awaiting: AwaitedField | null;
  createdAt: string;
  lastActiveAt: string;
  history: HistoryTurn[];
  ended: boolean;
  /** Record created by the last completed funnel; kept when the slots are cleared. */
  lastRecordId?: string;
}

export interface SessionSummary {
  sessionId: string;
  activeDomain: ActiveDomain;
  stage: SessionStage;
  turns: number;
  createdAt: string;
  lastActiveAt: string;
  recordId?: string;
}
