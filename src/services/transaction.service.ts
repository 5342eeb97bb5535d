import { DateTime } from 'luxon';
import { NotificationDispatcher, NotificationTemplate, RecordStore, ServiceProvider, VehicleListing } from '../types/capabilities';
import { FinanceQuote, FinanceType } from '../types/finance';
import {
  Appointment,
  BusinessRecord,
  CustomerDetails,
  Listing,
  Order,
  RecordKind,
  RecordNote,
  RecordStatus,
  Valuation,
} from '../types/records';
import { AcquisitionSlots, ConsignmentSlots, DomainSlots, ServiceSlots } from '../types/session';
import { ValuationService } from './valuation.service';
import { generateRecordId } from '../utils/recordIds';
import { formatDuration, getServiceType } from '../utils/serviceTypes';
import { formatGBP, formatNumber } from '../utils/format';
import { NotFoundError, PersistenceError, ServiceError, ValidationError, errorMessage, toError } from '../utils/errors';
import { logger } from '../utils/logger';

export const RECORD_COLLECTIONS = {
  order: 'orders',
  appointment: 'appointments',
  listing: 'listings',
} as const;

const KIND_BY_DOMAIN = {
  acquisition: 'order',
  service: 'appointment',
  consignment: 'listing',
} as const;

const TEMPLATES: Record<RecordKind, NotificationTemplate> = {
  order: 'order_confirmation',
  appointment: 'appointment_confirmation',
  listing: 'listing_confirmation',
};

const STATUS_TRANSITIONS: Record<RecordStatus, RecordStatus[]> = {
  pending: ['confirmed', 'cancelled'],
  confirmed: ['completed', 'cancelled'],
  completed: [],
  cancelled: [],
};

const LISTING_LIFETIME_DAYS = 90;
const MARKETPLACES = ['AutoTrader'];

export const NOTIFICATION_WARNING = 'Confirmation email could not be sent';

export type CreateResult =
  | {
      success: true;
      duplicate: boolean;
      kind: RecordKind;
      recordId: string;
      record: BusinessRecord;
      message: string;
      warnings: string[];
    }
  | { success: false; missingFields: string[] };

interface RecordBaseFields {
  status: 'pending';
  sessionId: string;
  funnelId: string;
  notes: RecordNote[];
  createdAt: string;
  updatedAt: string;
}

type Validation<T> = { ok: true; value: T } | { ok: false; missing: string[] };

interface OrderInput {
  vehicle: VehicleListing;
  financeType: FinanceType;
  financeQuote?: FinanceQuote;
  customer: CustomerDetails;
}

interface AppointmentInput {
  vehicle: { make: string; model: string; year: number; mileage: number };
  serviceType: string;
  serviceDescription?: string;
  provider: ServiceProvider;
  when: DateTime;
  customer: CustomerDetails;
}

interface ListingInput {
  vehicle: { make: string; model: string; year: number; color: string; mileage: number };
  reasonForSale: string;
  valuation?: Valuation;
  owner: CustomerDetails;
}

function text(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function validateOrder(slots: AcquisitionSlots): Validation<OrderInput> {
  const missing: string[] = [];
  const vehicle = slots.selectedVehicle;
  const financeType = slots.financeType;
  const name = text(slots.contact.name);
  const email = text(slots.contact.email);
  const phone = text(slots.contact.phone);

  if (!vehicle) missing.push('Vehicle selection');
  if (!financeType) missing.push('Payment method');
  if (!name) missing.push('Customer name');
  if (!email) missing.push('Email');
  if (!phone) missing.push('Phone');

  if (!vehicle || !financeType || !name || !email || !phone) return { ok: false, missing };
  return {
    ok: true,
    value: {
      vehicle,
      financeType,
      financeQuote: slots.financeQuote,
      customer: { name, email, phone, postcode: text(slots.contact.postcode) },
    },
  };
}

function validateAppointment(slots: ServiceSlots): Validation<AppointmentInput> {
  const missing: string[] = [];
  const make = text(slots.vehicle.make);
  const model = text(slots.vehicle.model);
  const { year, mileage } = slots.vehicle;
  const serviceType = text(slots.serviceType);
  const name = text(slots.contact.name);
  const email = text(slots.contact.email);
  const phone = text(slots.contact.phone);
  const postcode = text(slots.contact.postcode);
  const provider = slots.selectedProvider;
  const when = slots.appointmentDateTime ? DateTime.fromISO(slots.appointmentDateTime, { setZone: true }) : null;

  if (!make) missing.push('Vehicle make');
  if (!model) missing.push('Vehicle model');
  if (year === undefined) missing.push('Vehicle year');
  if (mileage === undefined) missing.push('Mileage');
  if (!serviceType) missing.push('Service type');
  if (!name) missing.push('Customer name');
  if (!email) missing.push('Email');
  if (!phone) missing.push('Phone');
  if (!postcode) missing.push('Postcode');
  if (!provider) missing.push('Service provider');
  if (!when || !when.isValid) missing.push('Appointment date');

  if (
    !make ||
    !model ||
    year === undefined ||
    mileage === undefined ||
    !serviceType ||
    !name ||
    !email ||
    !phone ||
    !postcode ||
    !provider ||
    !when ||
    !when.isValid
  ) {
    return { ok: false, missing };
  }
  return {
    ok: true,
    value: {
      vehicle: { make, model, year, mileage },
      serviceType,
      serviceDescription: text(slots.serviceDescription),
      provider,
      when,
      customer: { name, email, phone, postcode },
    },
  };
}

function validateListing(slots: ConsignmentSlots): Validation<ListingInput> {
  const missing: string[] = [];
  const make = text(slots.vehicle.make);
  const model = text(slots.vehicle.model);
  const color = text(slots.vehicle.color);
  const { year, mileage } = slots.vehicle;
  const reasonForSale = text(slots.reasonForSale);
  const name = text(slots.contact.name);
  const email = text(slots.contact.email);
  const phone = text(slots.contact.phone);

  if (!make) missing.push('Vehicle make');
  if (!model) missing.push('Vehicle model');
  if (year === undefined) missing.push('Vehicle year');
  if (!color) missing.push('Colour');
  if (mileage === undefined) missing.push('Mileage');
  if (!reasonForSale) missing.push('Reason for sale');
  if (!name) missing.push('Owner name');
  if (!email) missing.push('Email');
  if (!phone) missing.push('Phone');

  if (!make || !model || year === undefined || !color || mileage === undefined || !reasonForSale || !name || !email || !phone) {
    return { ok: false, missing };
  }
  return {
    ok: true,
    value: {
      vehicle: { make, model, year, color, mileage },
      reasonForSale,
      valuation: slots.valuation,
      owner: { name, email, phone },
    },
  };
}

export function recordIdOf(record: BusinessRecord): string {
  if ('orderId' in record) return record.orderId;
  if ('appointmentId' in record) return record.appointmentId;
  return record.listingId;
}

export function kindOf(record: BusinessRecord): RecordKind {
  if ('orderId' in record) return 'order';
  if ('appointmentId' in record) return 'appointment';
  return 'listing';
}

function contactOf(record: BusinessRecord): CustomerDetails {
  return 'owner' in record ? record.owner : record.customer;
}

/**
 * Turns a completed funnel into exactly one business record. Validation
 * failures come back as a result; only a failed write raises.
 */
export class TransactionService {
  constructor(
    private readonly store: RecordStore,
    private readonly notifier: NotificationDispatcher,
    private readonly valuations: ValuationService,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /** Every missing field for the funnel, by display label. Empty when complete. */
  validate(slots: DomainSlots): string[] {
    const result = this.check(slots);
    return result.ok ? [] : result.missing;
  }

  async create(slots: DomainSlots, sessionId: string): Promise<CreateResult> {
    const kind = KIND_BY_DOMAIN[slots.domain];

    const existing = await this.findByFunnel(kind, slots.funnelId);
    if (existing) {
      logger.info('Record already exists for funnel', { sessionId, funnelId: slots.funnelId, recordId: recordIdOf(existing) });
      slots.recordCreated = true;
      slots.recordId = recordIdOf(existing);
      return this.success(existing, true, []);
    }
    if (slots.recordCreated) {
      throw new NotFoundError(`No record found for completed funnel ${slots.funnelId}`);
    }

    // 1. Validate
    const validation = this.check(slots);
    if (!validation.ok) {
      logger.info('Record creation incomplete', { sessionId, domain: slots.domain, missing: validation.missing });
      return { success: false, missingFields: validation.missing };
    }

    // 2. Build with a fresh reference
    const now = this.clock();
    const recordId = generateRecordId(kind, now);
    const record = this.build(validation.value, recordId, slots.funnelId, sessionId, now);

    // 3. Persist (fatal on failure)
    try {
      await this.store.put(RECORD_COLLECTIONS[kind], recordId, record);
    } catch (error) {
      logger.error('Record persistence failed', { sessionId, recordId, error: errorMessage(error) });
      if (error instanceof ServiceError) throw error;
      throw new PersistenceError(`create:${kind}`, toError(error));
    }

    slots.recordCreated = true;
    slots.recordId = recordId;
    logger.info('Record created', { sessionId, kind, recordId, funnelId: slots.funnelId });

    // 4. Notify (best effort)
    const warnings: string[] = [];
    const delivered = await this.notify(record);
    if (!delivered) {
      logger.warn('Confirmation notification failed', { sessionId, recordId });
      warnings.push(NOTIFICATION_WARNING);
    }

    // 5. Confirm
    return this.success(record, false, warnings);
  }

  async getRecord(kind: RecordKind, recordId: string): Promise<BusinessRecord | null> {
    return this.store.get(RECORD_COLLECTIONS[kind], recordId);
  }

  async updateStatus(kind: RecordKind, recordId: string, status: RecordStatus, note?: string): Promise<BusinessRecord> {
    const record = await this.getRecord(kind, recordId);
    if (!record) {
      throw new NotFoundError(`${kind} ${recordId} not found`);
    }

    if (!STATUS_TRANSITIONS[record.status].includes(status)) {
      throw new ValidationError(`Cannot move ${kind} ${recordId} from ${record.status} to ${status}`);
    }

    const timestamp = this.clock().toISOString();
    record.status = status;
    record.updatedAt = timestamp;
    record.notes.push({ status, note: note ?? `Status changed to ${status}`, timestamp });

    await this.store.put(RECORD_COLLECTIONS[kind], recordId, record);
    logger.info('Record status updated', { kind, recordId, status });
    return record;
  }

  async listByEmail(kind: RecordKind, email: string, limit = 10): Promise<BusinessRecord[]> {
    const field = kind === 'listing' ? 'owner.email' : 'customer.email';
    return this.store.find(RECORD_COLLECTIONS[kind], {
      filter: { [field]: email.trim() },
      sort: { field: 'createdAt', direction: 'desc' },
      limit,
    });
  }

  private check(slots: DomainSlots): Validation<OrderInput | AppointmentInput | ListingInput> {
    switch (slots.domain) {
      case 'acquisition':
        return validateOrder(slots);
      case 'service':
        return validateAppointment(slots);
      case 'consignment':
        return validateListing(slots);
    }
  }

  private async findByFunnel(kind: RecordKind, funnelId: string): Promise<BusinessRecord | null> {
    const [record] = await this.store.find(RECORD_COLLECTIONS[kind], { filter: { funnelId }, limit: 1 });
    return record ?? null;
  }

  private build(
    input: OrderInput | AppointmentInput | ListingInput,
    recordId: string,
    funnelId: string,
    sessionId: string,
    now: Date
  ): BusinessRecord {
    const timestamp = now.toISOString();
    const notes: RecordNote[] = [{ status: 'pending', note: 'Created from conversation', timestamp }];
    const base: RecordBaseFields = { status: 'pending', sessionId, funnelId, notes, createdAt: timestamp, updatedAt: timestamp };

    if ('financeType' in input) return this.buildOrder(input, recordId, base);
    if ('provider' in input) return this.buildAppointment(input, recordId, base);
    return this.buildListing(input, recordId, base, now);
  }

  private buildOrder(input: OrderInput, orderId: string, base: RecordBaseFields): Order {
    const { vehicle, financeType, financeQuote } = input;
    const order: Order = {
      ...base,
      orderId,
      orderType: 'purchase',
      vehicle: {
        listingId: vehicle.id,
        make: vehicle.make,
        model: vehicle.model,
        year: vehicle.year,
        price: vehicle.price,
        mileage: vehicle.mileage,
        location: vehicle.location,
      },
      customer: input.customer,
      totalAmount: vehicle.price,
    };

    if (financeType !== 'cash' && financeQuote) {
      order.finance = {
        type: financeType,
        productName: financeQuote.productName,
        provider: financeQuote.provider,
        monthlyPayment: financeQuote.monthlyPayment,
        termMonths: financeQuote.termMonths,
        deposit: financeQuote.deposit,
        annualRatePercent: financeQuote.annualRatePercent,
        totalCost: financeQuote.totalCost,
        finalPayment: financeQuote.finalPayment,
      };
      order.totalAmount = financeQuote.totalCost;
    }
    return order;
  }

  private buildAppointment(input: AppointmentInput, appointmentId: string, base: RecordBaseFields): Appointment {
    const definition = getServiceType(input.serviceType);
    const { provider } = input;

    return {
      ...base,
      appointmentId,
      vehicle: input.vehicle,
      service: {
        type: definition.type,
        description: input.serviceDescription ?? definition.label,
        estimatedDurationHours: definition.durationHours,
      },
      provider: {
        id: provider.id,
        name: provider.name,
        location: provider.location,
        tier: provider.tier,
        rating: provider.rating,
        phone: provider.phone,
        distanceMiles: provider.distanceMiles,
        estimatedCost: provider.estimatedCost,
      },
      appointment: {
        date: input.when.toFormat('yyyy-MM-dd'),
        time: input.when.toFormat('HH:mm'),
        datetime: input.when.toISO() ?? '',
        durationEstimate: formatDuration(definition.durationHours),
      },
      customer: input.customer,
    };
  }

  private buildListing(input: ListingInput, listingId: string, base: RecordBaseFields, now: Date): Listing {
    const { vehicle } = input;
    const valuation = input.valuation ?? this.valuations.estimate(vehicle.year, vehicle.mileage);
    const title = `${vehicle.year} ${vehicle.make} ${vehicle.model}`;

    return {
      ...base,
      listingId,
      vehicle,
      pricing: { askingPrice: valuation.privateSale, valuation, negotiable: true },
      owner: input.owner,
      reasonForSale: input.reasonForSale,
      listing: {
        title,
        description: [
          `${title} in ${vehicle.color.toLowerCase()} with ${formatNumber(vehicle.mileage)} miles on the clock.`,
          'Service history available on request.',
          'Contact us to arrange a viewing or for more information.',
        ].join(' '),
        highlights: [title, `Only ${formatNumber(vehicle.mileage)} miles`, `Finished in ${vehicle.color}`, 'Ready to view'],
      },
      marketplaces: [...MARKETPLACES],
      expiresAt: DateTime.fromJSDate(now).plus({ days: LISTING_LIFETIME_DAYS }).toUTC().toISO() ?? '',
    };
  }

  /** The dispatcher reports failure as false; a throw is treated the same way. */
  private async notify(record: BusinessRecord): Promise<boolean> {
    const contact = contactOf(record);
    const kind = kindOf(record);
    try {
      return await this.notifier.notify(contact.email, TEMPLATES[kind], {
        recordId: recordIdOf(record),
        kind,
        name: contact.name,
        phone: contact.phone,
        summary: this.summaryLines(record),
      });
    } catch (error) {
      logger.warn('Notification dispatcher raised', { recordId: recordIdOf(record), error: errorMessage(error) });
      return false;
    }
  }

  private success(record: BusinessRecord, duplicate: boolean, warnings: string[]): CreateResult {
    const kind = kindOf(record);
    return {
      success: true,
      duplicate,
      kind,
      recordId: recordIdOf(record),
      record,
      message: this.confirmation(record),
      warnings,
    };
  }

  summaryLines(record: BusinessRecord): string[] {
    if ('orderId' in record) {
      const { vehicle, finance } = record;
      const lines = [`Vehicle: ${vehicle.year} ${vehicle.make} ${vehicle.model}`, `Price: ${formatGBP(vehicle.price, true)}`];
      lines.push(
        finance
          ? `Payment: ${finance.productName}, ${formatGBP(finance.monthlyPayment)}/month over ${finance.termMonths} months`
          : 'Payment: Cash'
      );
      return lines;
    }

    if ('appointmentId' in record) {
      const { vehicle, service, provider, appointment } = record;
      return [
        `Vehicle: ${vehicle.year} ${vehicle.make} ${vehicle.model}`,
        `Service: ${getServiceType(service.type).label} (${appointment.durationEstimate})`,
        `Provider: ${provider.name}, ${provider.location}`,
        `When: ${appointment.date} at ${appointment.time}`,
        `Estimated cost: ${formatGBP(provider.estimatedCost, true)}`,
      ];
    }

    return [
      `Vehicle: ${record.listing.title}`,
      `Mileage: ${formatNumber(record.vehicle.mileage)} miles`,
      `Asking price: ${formatGBP(record.pricing.askingPrice, true)}`,
      `Listed on: ${record.marketplaces.join(', ')}`,
    ];
  }

  confirmation(record: BusinessRecord): string {
    const recordId = recordIdOf(record);
    const contact = contactOf(record);
    let heading: string;
    let nextSteps: string[];

    if ('orderId' in record) {
      heading = 'Your order is confirmed.';
      nextSteps = [
        'A sales specialist will call you within 24 hours to arrange your viewing.',
        `We will send the paperwork to ${contact.email}.`,
        'Bring photo ID and proof of address when you collect the car.',
      ];
    } else if ('appointmentId' in record) {
      heading = 'Your service appointment is booked.';
      nextSteps = [
        `${record.provider.name} will confirm the booking by phone.`,
        `A confirmation has been sent to ${contact.email}.`,
        'Please bring the service book and spare keys.',
      ];
    } else {
      heading = 'Your listing has been created.';
      nextSteps = [
        'Our team will review the listing before it goes live.',
        `Enquiries will be forwarded to ${contact.email}.`,
        `The listing runs for ${LISTING_LIFETIME_DAYS} days and can be renewed.`,
      ];
    }

    return [
      heading,
      `Reference: ${recordId}`,
      ...this.summaryLines(record),
      'Next steps:',
      ...nextSteps.map((step, index) => `${index + 1}. ${step}`),
    ].join('\n');
  }
}
