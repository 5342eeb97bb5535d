import { FinanceType } from './finance';

export type RecordStatus = 'pending' | 'confirmed' | 'completed' | 'cancelled';

export const RECORD_STATUSES: readonly RecordStatus[] = ['pending', 'confirmed', 'completed', 'cancelled'];

export type RecordKind = 'order' | 'appointment' | 'listing';

export interface RecordNote {
  status?: RecordStatus;
  note: string;
  timestamp: string;
}

export interface CustomerDetails {
  name: string;
  email: string;
  phone: string;
  postcode?: string;
}

interface RecordBase {
  status: RecordStatus;
  sessionId: string;
  funnelId: string;
  notes: RecordNote[];
  createdAt: string;
  updatedAt: string;
}

export interface Order extends RecordBase {
  orderId: string;
  orderType: 'purchase';
  vehicle: {
    listingId: string;
    make: string;
    model: string;
    year: number;
    price: number;
    mileage?: number;
    location?: string;
  };
  customer: CustomerDetails;
  finance?: {
    type: FinanceType;
    productName: string;
    provider: string;
    monthlyPayment: number;
    termMonths: number;
    deposit: number;
    annualRatePercent: number;
    totalCost: number;
    finalPayment?: number;
  };
  totalAmount: number;
}

export interface Appointment extends RecordBase {
  appointmentId: string;
  vehicle: {
    make: string;
    model: string;
    year: number;
    mileage: number;
  };
  service: {
    type: string;
    description: string;
    estimatedDurationHours: number;
  };
  provider: {
    id: string;
    name: string;
    location: string;
    tier: 1 | 2;
    rating: number;
    phone: string;
    distanceMiles: number;
    estimatedCost: number;
  };
  appointment: {
    date: string;
    time: string;
    datetime: string;
    durationEstimate: string;
  };
  customer: CustomerDetails;
}

export interface Valuation {
  tradeIn: number;
  privateSale: number;
  retail: number;
}

export interface Listing extends RecordBase {
  listingId: string;
  vehicle: {
    make: string;
    model: string;
    year: number;
    color: string;
    mileage: number;
  };
  pricing: {
    askingPrice: number;
    valuation: Valuation;
    negotiable: boolean;
  };
  owner: CustomerDetails;
  reasonForSale: string;
  listing: {
    title: string;
    description: string;
    highlights: string[];
  };
  marketplaces: string[];
  expiresAt: string;
}

export type BusinessRecord = Order | Appointment | Listing;
