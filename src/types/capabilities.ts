import { Appointment, Listing, Order } from './records';
import { SearchCriteria, SessionState } from './session';

export interface VehicleListing {
  id: string;
  make: string;
  model: string;
  year: number;
  price: number;
  mileage?: number;
  location?: string;
  color?: string;
  source?: string;
  url?: string;
}

export interface ServiceProvider {
  id: string;
  name: string;
  location: string;
  tier: 1 | 2;
  rating: number;
  phone: string;
  specialties: string[];
  distanceMiles: number;
  estimatedCost: number;
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface TextCompletion {
  complete(systemContext: string, turns: ConversationTurn[]): Promise<string>;
}

export interface VehicleSearchProvider {
  search(criteria: SearchCriteria): Promise<VehicleListing[]>;
}

export interface ServiceProviderDirectory {
  findProviders(make: string, serviceType: string, postcode: string): ServiceProvider[];
}

export type NotificationTemplate = 'order_confirmation' | 'appointment_confirmation' | 'listing_confirmation';

export interface NotificationDispatcher {
  notify(recipient: string, template: NotificationTemplate, data: Record<string, unknown>): Promise<boolean>;
}

/** Collection name → stored document type. */
export interface Collections {
  sessions: SessionState;
  orders: Order;
  appointments: Appointment;
  listings: Listing;
  vehicles: VehicleListing;
}

export type CollectionName = keyof Collections;

export type Comparable = number | string;

export interface RangeFilter {
  gt?: Comparable;
  gte?: Comparable;
  lt?: Comparable;
  lte?: Comparable;
}

export type FilterValue = string | number | boolean | RangeFilter;

/** Keys are dotted field paths, e.g. `customer.email`. */
export type RecordFilter = Record<string, FilterValue>;

export interface FindOptions {
  filter?: RecordFilter;
  sort?: { field: string; direction: 'asc' | 'desc' };
  limit?: number;
}

export interface RecordStore {
  get<C extends CollectionName>(collection: C, key: string): Promise<Collections[C] | null>;
  put<C extends CollectionName>(collection: C, key: string, record: Collections[C]): Promise<void>;
  find<C extends CollectionName>(collection: C, options?: FindOptions): Promise<Collections[C][]>;
  delete(collection: CollectionName, key: string): Promise<boolean>;
}
