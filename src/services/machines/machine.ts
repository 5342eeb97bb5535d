import { AwaitedField, ContactInfo, Domain, DomainSlots, SessionStage, VehicleFacts } from '../../types/session';
import { ContactFactSignal, Signal, VehicleFactSignal } from '../../types/signal';
import { logger } from '../../utils/logger';

export interface Requirement<S> {
  field: AwaitedField;
  label: string;
  filled: (slots: S) => boolean;
}

export type StageRequirements<S, Stage extends string> = Record<Stage, Requirement<S>[]>;

export interface MissingField {
  field: AwaitedField;
  label: string;
}

export interface MachineResult<S, Stage extends string> {
  stage: Stage;
  slots: S;
  missing: MissingField[];
  awaiting: AwaitedField | null;
  /** Stages entered during this turn, in order. */
  entered: Stage[];
}

export type VehicleField = 'make' | 'model' | 'year' | 'mileage' | 'color';

/** Copies the listed vehicle facts from a signal; absent facts leave the slot untouched. */
export function mergeVehicle(target: VehicleFacts, signal: VehicleFactSignal, fields: VehicleField[]): void {
  for (const field of fields) {
    switch (field) {
      case 'make':
        if (signal.make) target.make = signal.make;
        break;
      case 'model':
        if (signal.model) target.model = signal.model;
        break;
      case 'year':
        if (signal.year !== undefined) target.year = signal.year;
        break;
      case 'mileage':
        if (signal.mileage !== undefined) target.mileage = signal.mileage;
        break;
      case 'color':
        if (signal.color) target.color = signal.color;
        break;
    }
  }
}

export function mergeContact(target: ContactInfo, signal: ContactFactSignal, withPostcode: boolean): void {
  if (signal.name) target.name = signal.name;
  if (signal.email) target.email = signal.email;
  if (signal.phone) target.phone = signal.phone;
  if (withPostcode && signal.postcode) target.postcode = signal.postcode;
}

/**
 * Ordered slot-filling funnel ending in `ready`. Each turn merges signals, then
 * walks forward while the current stage has nothing missing. Stages never move back.
 */
export abstract class DomainMachine<S extends DomainSlots, Stage extends string> {
  abstract readonly domain: Domain;
  abstract readonly stages: readonly Stage[];
  protected abstract readonly requirements: StageRequirements<S, Stage>;

  abstract initialSlots(funnelId: string): S;

  /** Folds one signal into the slots; signals the stage cannot use are ignored. */
  protected abstract merge(slots: S, signal: Signal, stage: Stage): void;

  /** Read-only lookups a stage depends on, cached into the slots. */
  protected abstract resolve(stage: Stage, slots: S): Promise<void>;

  get initialStage(): Stage {
    return this.stages[0];
  }

  /** Maps a persisted session stage onto this funnel, restarting when it belongs elsewhere. */
  toStage(value: SessionStage): Stage {
    return this.stages.find((stage) => stage === value) ?? this.initialStage;
  }

  /** True when the field is required by this stage or one after it. Earlier slots are closed. */
  protected accepts(stage: Stage, field: AwaitedField): boolean {
    const index = this.stages.indexOf(stage);
    return this.stages
      .slice(Math.max(0, index))
      .some((candidate) => this.requirements[candidate].some((requirement) => requirement.field === field));
  }

  missingFor(stage: Stage, slots: S): MissingField[] {
    return this.requirements[stage]
      .filter((requirement) => !requirement.filled(slots))
      .map(({ field, label }) => ({ field, label }));
  }

  async advance(current: Stage, slots: S, signals: Signal[], sessionId: string): Promise<MachineResult<S, Stage>> {
    for (const signal of signals) {
      this.merge(slots, signal, current);
    }

    let stage = current;
    const entered: Stage[] = [];

    for (;;) {
      await this.resolve(stage, slots);
      const missing = this.missingFor(stage, slots);
      const next = this.nextStage(stage);

      if (missing.length > 0 || !next) {
        return { stage, slots, missing, awaiting: missing[0]?.field ?? null, entered };
      }

      logger.info('Stage advanced', { sessionId, domain: this.domain, from: stage, to: next });
      stage = next;
      entered.push(next);
    }
  }

  private nextStage(stage: Stage): Stage | undefined {
    const index = this.stages.indexOf(stage);
    return index >= 0 ? this.stages[index + 1] : undefined;
  }
}
