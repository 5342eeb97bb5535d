import { ValuationService } from '../valuation.service';
import { CONSIGNMENT_STAGES, ConsignmentSlots, ConsignmentStage } from '../../types/session';
import { Signal } from '../../types/signal';
import { DomainMachine, StageRequirements, VehicleField, mergeContact, mergeVehicle } from './machine';

const VEHICLE_FIELDS: VehicleField[] = ['make', 'model', 'year', 'color', 'mileage'];

export class ConsignmentMachine extends DomainMachine<ConsignmentSlots, ConsignmentStage> {
  readonly domain = 'consignment';
  readonly stages = CONSIGNMENT_STAGES;

  protected readonly requirements: StageRequirements<ConsignmentSlots, ConsignmentStage> = {
    vehicle_details: [
      { field: 'make', label: 'Vehicle make', filled: (s) => Boolean(s.vehicle.make) },
      { field: 'model', label: 'Vehicle model', filled: (s) => Boolean(s.vehicle.model) },
      { field: 'year', label: 'Vehicle year', filled: (s) => s.vehicle.year !== undefined },
    ],
    vehicle_condition: [
      { field: 'color', label: 'Colour', filled: (s) => Boolean(s.vehicle.color) },
      { field: 'mileage', label: 'Mileage', filled: (s) => s.vehicle.mileage !== undefined },
    ],
    sale_reason: [{ field: 'sale_reason', label: 'Reason for sale', filled: (s) => Boolean(s.reasonForSale) }],
    owner_details: [
      { field: 'name', label: 'Owner name', filled: (s) => Boolean(s.contact.name) },
      { field: 'email', label: 'Email', filled: (s) => Boolean(s.contact.email) },
      { field: 'phone', label: 'Phone', filled: (s) => Boolean(s.contact.phone) },
    ],
    ready: [],
  };

  constructor(private readonly valuations: ValuationService) {
    super();
  }

  initialSlots(funnelId: string): ConsignmentSlots {
    return {
      domain: 'consignment',
      funnelId,
      vehicle: {},
      contact: {},
      recordCreated: false,
    };
  }

  protected merge(slots: ConsignmentSlots, signal: Signal, stage: ConsignmentStage): void {
    switch (signal.type) {
      case 'vehicle':
        mergeVehicle(
          slots.vehicle,
          signal,
          VEHICLE_FIELDS.filter((field) => this.accepts(stage, field))
        );
        break;
      case 'sale_reason':
        if (this.accepts(stage, 'sale_reason')) slots.reasonForSale = signal.reason;
        break;
      case 'contact':
        if (this.accepts(stage, 'name')) mergeContact(slots.contact, signal, false);
        break;
      default:
        break;
    }
  }

  /** Re-values the car whenever its year or mileage changes. */
  protected async resolve(_stage: ConsignmentStage, slots: ConsignmentSlots): Promise<void> {
    const { year, mileage } = slots.vehicle;
    if (year === undefined || mileage === undefined) return;

    const key = `${year}|${mileage}`;
    if (key === slots.valuationKey) return;

    slots.valuation = this.valuations.estimate(year, mileage);
    slots.valuationKey = key;
  }
}
