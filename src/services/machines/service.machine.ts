import { DateTime } from 'luxon';
import { ServiceProviderDirectory } from '../../types/capabilities';
import { SERVICE_STAGES, ServiceSlots, ServiceStage } from '../../types/session';
import { DateTimeSignal, Signal } from '../../types/signal';
import {
  BusinessHoursConfig,
  DEFAULT_BUSINESS_HOURS,
  describeBusinessHours,
  getNextBusinessWindow,
  isWithinBusinessHours,
} from '../../utils/businessHours';
import { DomainMachine, StageRequirements, VehicleField, mergeContact, mergeVehicle } from './machine';
import { logger } from '../../utils/logger';

const VEHICLE_FIELDS: VehicleField[] = ['make', 'model', 'year', 'mileage'];

export interface ServiceMachineOptions {
  businessHours?: BusinessHoursConfig;
  clock?: () => Date;
}

export class ServiceBookingMachine extends DomainMachine<ServiceSlots, ServiceStage> {
  readonly domain = 'service';
  readonly stages = SERVICE_STAGES;

  protected readonly requirements: StageRequirements<ServiceSlots, ServiceStage> = {
    vehicle_details: [
      { field: 'make', label: 'Vehicle make', filled: (s) => Boolean(s.vehicle.make) },
      { field: 'model', label: 'Vehicle model', filled: (s) => Boolean(s.vehicle.model) },
      { field: 'year', label: 'Vehicle year', filled: (s) => s.vehicle.year !== undefined },
      { field: 'mileage', label: 'Mileage', filled: (s) => s.vehicle.mileage !== undefined },
    ],
    service_type: [{ field: 'service_type', label: 'Service type', filled: (s) => Boolean(s.serviceType) }],
    customer_details: [
      { field: 'name', label: 'Customer name', filled: (s) => Boolean(s.contact.name) },
      { field: 'email', label: 'Email', filled: (s) => Boolean(s.contact.email) },
      { field: 'phone', label: 'Phone', filled: (s) => Boolean(s.contact.phone) },
      { field: 'postcode', label: 'Postcode', filled: (s) => Boolean(s.contact.postcode) },
    ],
    provider_selection: [
      { field: 'choice', label: 'Service provider', filled: (s) => s.selectedProvider !== undefined },
    ],
    appointment_datetime: [
      { field: 'datetime', label: 'Appointment date', filled: (s) => Boolean(s.appointmentDateTime) },
    ],
    ready: [],
  };

  private readonly businessHours: BusinessHoursConfig;
  private readonly clock: () => Date;

  constructor(
    private readonly directory: ServiceProviderDirectory,
    options: ServiceMachineOptions = {}
  ) {
    super();
    this.businessHours = options.businessHours ?? DEFAULT_BUSINESS_HOURS;
    this.clock = options.clock ?? (() => new Date());
  }

  initialSlots(funnelId: string): ServiceSlots {
    return {
      domain: 'service',
      funnelId,
      vehicle: {},
      contact: {},
      providers: [],
      recordCreated: false,
    };
  }

  protected merge(slots: ServiceSlots, signal: Signal, stage: ServiceStage): void {
    switch (signal.type) {
      case 'vehicle':
        mergeVehicle(slots.vehicle, signal, this.openVehicleFields(stage));
        break;
      case 'service':
        if (this.accepts(stage, 'service_type')) {
          slots.serviceType = signal.serviceType;
          slots.serviceDescription = signal.description;
        }
        break;
      case 'contact':
        if (this.accepts(stage, 'name')) mergeContact(slots.contact, signal, true);
        break;
      case 'choice':
        if (stage === 'provider_selection') this.selectProvider(slots, signal.index);
        break;
      case 'datetime':
        if (this.accepts(stage, 'datetime')) this.mergeAppointment(slots, signal);
        break;
      default:
        break;
    }
  }

  protected async resolve(stage: ServiceStage, slots: ServiceSlots): Promise<void> {
    if (stage !== 'provider_selection') return;

    const { make } = slots.vehicle;
    const { postcode } = slots.contact;
    const serviceType = slots.serviceType;
    if (!make || !postcode || !serviceType) return;

    const key = [make, serviceType, postcode].join('|').toLowerCase();
    if (key === slots.providersKey) return;

    slots.providers = this.directory.findProviders(make, serviceType, postcode);
    slots.providersKey = key;
  }

  /** Why a proposed appointment time cannot be booked, or null when it can. */
  rejectionReason(moment: DateTime): string | null {
    if (!moment.isValid) return 'that time could not be understood';
    if (moment.toMillis() <= this.clock().getTime()) return 'that time is in the past';
    if (!isWithinBusinessHours(moment, this.businessHours)) {
      return `that time is outside our opening hours (${describeBusinessHours(this.businessHours)})`;
    }
    return null;
  }

  private openVehicleFields(stage: ServiceStage): VehicleField[] {
    return VEHICLE_FIELDS.filter((field) => this.accepts(stage, field));
  }

  private selectProvider(slots: ServiceSlots, index: number): void {
    const provider = slots.providers[index - 1];
    if (!provider) {
      logger.debug('Provider choice out of range', { funnelId: slots.funnelId, index, options: slots.providers.length });
      return;
    }
    slots.selectedProvider = provider;
  }

  private mergeAppointment(slots: ServiceSlots, signal: DateTimeSignal): void {
    const moment = DateTime.fromISO(signal.value, { setZone: true });
    const reason = this.rejectionReason(moment);

    if (reason) {
      const now = DateTime.fromJSDate(this.clock());
      const from = moment.isValid && moment.toMillis() > now.toMillis() ? moment : now;
      const next = getNextBusinessWindow(from, this.businessHours);
      slots.rejectedDateTime = { value: signal.value, reason };
      if (next) slots.rejectedDateTime.suggestion = next.start.toISO() ?? undefined;
      logger.debug('Appointment time rejected', { funnelId: slots.funnelId, value: signal.value, reason });
      return;
    }

    slots.appointmentDateTime = signal.value;
    delete slots.rejectedDateTime;
  }
}
