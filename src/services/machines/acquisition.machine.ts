import { FinanceService } from '../finance.service';
import { criteriaKey } from '../search.service';
import { VehicleSearchProvider } from '../../types/capabilities';
import { ACQUISITION_STAGES, AcquisitionSlots, AcquisitionStage } from '../../types/session';
import { Signal, VehicleFactSignal } from '../../types/signal';
import { mergeContact, DomainMachine, StageRequirements } from './machine';
import { logger } from '../../utils/logger';

const hasCriteria = (slots: AcquisitionSlots): boolean => Boolean(slots.criteria.make || slots.criteria.model);

export class AcquisitionMachine extends DomainMachine<AcquisitionSlots, AcquisitionStage> {
  readonly domain = 'acquisition';
  readonly stages = ACQUISITION_STAGES;

  protected readonly requirements: StageRequirements<AcquisitionSlots, AcquisitionStage> = {
    vehicle_search: [
      // An empty result set keeps the funnel here so the customer can try another make.
      { field: 'make', label: 'Vehicle make', filled: (s) => hasCriteria(s) && s.searchResults.length > 0 },
    ],
    vehicle_selection: [{ field: 'choice', label: 'Vehicle selection', filled: (s) => s.selectedVehicle !== undefined }],
    customer_info: [
      { field: 'name', label: 'Customer name', filled: (s) => Boolean(s.contact.name) },
      { field: 'email', label: 'Email', filled: (s) => Boolean(s.contact.email) },
      { field: 'phone', label: 'Phone', filled: (s) => Boolean(s.contact.phone) },
    ],
    ready: [],
  };

  constructor(
    private readonly search: VehicleSearchProvider,
    private readonly finance: FinanceService
  ) {
    super();
  }

  initialSlots(funnelId: string): AcquisitionSlots {
    return {
      domain: 'acquisition',
      funnelId,
      criteria: {},
      searchResults: [],
      contact: {},
      recordCreated: false,
    };
  }

  protected merge(slots: AcquisitionSlots, signal: Signal, stage: AcquisitionStage): void {
    switch (signal.type) {
      case 'vehicle':
        if (this.accepts(stage, 'make')) this.mergeCriteria(slots, signal);
        break;
      case 'budget':
        if (this.accepts(stage, 'make')) slots.criteria.maxPrice = signal.maxPrice;
        break;
      case 'choice':
        if (stage === 'vehicle_selection') this.select(slots, signal.index);
        break;
      case 'confirmation':
        if (stage === 'vehicle_selection' && signal.accepted && slots.searchResults.length === 1) {
          this.select(slots, 1);
        }
        break;
      case 'finance':
        slots.financeType = signal.financeType;
        break;
      case 'contact':
        if (this.accepts(stage, 'name')) mergeContact(slots.contact, signal, true);
        break;
      default:
        break;
    }
  }

  protected async resolve(stage: AcquisitionStage, slots: AcquisitionSlots): Promise<void> {
    if ((stage === 'vehicle_search' || stage === 'vehicle_selection') && hasCriteria(slots)) {
      const key = criteriaKey(slots.criteria);
      if (key !== slots.searchKey) {
        slots.searchResults = await this.search.search(slots.criteria);
        slots.searchKey = key;
      }
    }

    this.refreshQuote(slots);
  }

  /** A new make or model replaces the search; year alone narrows the current one. */
  private mergeCriteria(slots: AcquisitionSlots, signal: VehicleFactSignal): void {
    if (signal.make || signal.model) {
      slots.criteria = { ...slots.criteria, make: signal.make, model: signal.model };
      if (!signal.make) delete slots.criteria.make;
      if (!signal.model) delete slots.criteria.model;
    }
    if (signal.year !== undefined) slots.criteria.minYear = signal.year;
  }

  private select(slots: AcquisitionSlots, index: number): void {
    const vehicle = slots.searchResults[index - 1];
    if (!vehicle) {
      logger.debug('Choice out of range', { funnelId: slots.funnelId, index, options: slots.searchResults.length });
      return;
    }
    if (slots.selectedVehicle?.id !== vehicle.id) delete slots.financeQuote;
    slots.selectedVehicle = vehicle;
    slots.financeType = slots.financeType ?? 'cash';
  }

  private refreshQuote(slots: AcquisitionSlots): void {
    const vehicle = slots.selectedVehicle;
    const financeType = slots.financeType;

    if (!vehicle || !financeType || financeType === 'cash') {
      delete slots.financeQuote;
      return;
    }

    if (slots.financeQuote?.product !== financeType) {
      slots.financeQuote = this.finance.quote(financeType, vehicle.price);
    }
  }
}
