jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { NOTIFICATION_WARNING, TransactionService, kindOf, recordIdOf } from '../../src/services/transaction.service';
import { ValuationService } from '../../src/services/valuation.service';
import { MemoryRecordStore } from '../../src/services/store/memory.store';
import { ServiceProvider } from '../../src/types/capabilities';
import { AcquisitionSlots, ConsignmentSlots, ServiceSlots } from '../../src/types/session';
import { NotFoundError, PersistenceError, ValidationError } from '../../src/utils/errors';
import { RECORD_ID_PATTERN } from '../../src/utils/recordIds';

const provider: ServiceProvider = {
  id: 'prv-1',
  name: 'Test Motors',
  location: 'London',
  tier: 1,
  rating: 4.8,
  phone: '+440000000001',
  specialties: ['Ferrari'],
  distanceMiles: 3,
  estimatedCost: 960,
};

function orderSlots(funnelId = 'funnel-order'): AcquisitionSlots {
  return {
    domain: 'acquisition',
    funnelId,
    criteria: { make: 'Ferrari' },
    searchResults: [],
    selectedVehicle: { id: 'veh-2', make: 'Ferrari', model: 'Roma', year: 2022, price: 189950, mileage: 3200, location: 'London' },
    financeType: 'cash',
    contact: { name: 'John Smith', email: 'john@x.com', phone: '+447000000000' },
    recordCreated: false,
  };
}

function serviceSlots(): ServiceSlots {
  return {
    domain: 'service',
    funnelId: 'funnel-service',
    vehicle: { make: 'Ferrari', model: 'Roma', year: 2022, mileage: 8000 },
    serviceType: 'brake_service',
    serviceDescription: 'brakes squealing',
    contact: { name: 'Siya', email: 'siya@example.com', phone: '+447700900123', postcode: 'SW1A 1AA' },
    providers: [provider],
    selectedProvider: provider,
    recordCreated: false,
  };
}

function listingSlots(): ConsignmentSlots {
  return {
    domain: 'consignment',
    funnelId: 'funnel-listing',
    vehicle: { make: 'Porsche', model: '911', year: 2021, mileage: 20000, color: 'Black' },
    reasonForSale: 'upgrading',
    contact: { name: 'Jane Doe', email: 'jane@example.com', phone: '07700900123' },
    recordCreated: false,
  };
}

describe('TransactionService', () => {
  let store: MemoryRecordStore;
  let notifier: { notify: jest.Mock };
  let now: Date;
  let transactions: TransactionService;

  beforeEach(() => {
    store = new MemoryRecordStore();
    notifier = { notify: jest.fn().mockResolvedValue(true) };
    now = new Date('2026-06-10T09:00:00.000Z');
    const clock = () => now;
    transactions = new TransactionService(store, notifier, new ValuationService(200000, clock), clock);
  });

  describe('validation', () => {
    it('should report only the missing appointment date for an otherwise complete booking', async () => {
      const slots = serviceSlots();
      const before = structuredClone(slots);

      expect(transactions.validate(slots)).toEqual(['Appointment date']);
      await expect(transactions.create(slots, 's-1')).resolves.toEqual({
        success: false,
        missingFields: ['Appointment date'],
      });

      expect(slots).toEqual(before);
      expect(store.count('appointments')).toBe(0);
      expect(notifier.notify).not.toHaveBeenCalled();
    });

    it('should list every missing order field by label', () => {
      const slots: AcquisitionSlots = { ...orderSlots(), selectedVehicle: undefined, financeType: undefined, contact: {} };

      expect(transactions.validate(slots)).toEqual(['Vehicle selection', 'Payment method', 'Customer name', 'Email', 'Phone']);
    });

    it('should treat blank text as missing', () => {
      const slots = listingSlots();
      slots.reasonForSale = '   ';

      expect(transactions.validate(slots)).toEqual(['Reason for sale']);
    });
  });

  describe('create', () => {
    it('should persist an order and confirm it', async () => {
      const slots = orderSlots();
      const result = await transactions.create(slots, 's-1');

      if (!result.success) throw new Error('expected success');
      expect(result.duplicate).toBe(false);
      expect(result.kind).toBe('order');
      expect(result.recordId).toMatch(/^ORD-RA-2026-[A-Z0-9]{5}$/);
      expect(result.warnings).toEqual([]);
      expect(slots.recordCreated).toBe(true);
      expect(slots.recordId).toBe(result.recordId);
      expect(await store.get('orders', result.recordId)).toEqual(result.record);

      expect(result.message).toBe(
        [
          'Your order is confirmed.',
          `Reference: ${result.recordId}`,
          'Vehicle: 2022 Ferrari Roma',
          'Price: £189,950',
          'Payment: Cash',
          'Next steps:',
          '1. A sales specialist will call you within 24 hours to arrange your viewing.',
          '2. We will send the paperwork to john@x.com.',
          '3. Bring photo ID and proof of address when you collect the car.',
        ].join('\n')
      );

      expect(notifier.notify).toHaveBeenCalledWith('john@x.com', 'order_confirmation', {
        recordId: result.recordId,
        kind: 'order',
        name: 'John Smith',
        phone: '+447000000000',
        summary: ['Vehicle: 2022 Ferrari Roma', 'Price: £189,950', 'Payment: Cash'],
      });
    });

    it('should return the existing record for a funnel instead of writing another', async () => {
      const first = await transactions.create(orderSlots(), 's-1');
      const second = await transactions.create(orderSlots(), 's-1');

      if (!first.success || !second.success) throw new Error('expected success');
      expect(second.duplicate).toBe(true);
      expect(second.recordId).toBe(first.recordId);
      expect(store.count('orders')).toBe(1);
      expect(notifier.notify).toHaveBeenCalledTimes(1);
    });

    it('should write separate records for separate funnels', async () => {
      await transactions.create(orderSlots('funnel-a'), 's-1');
      await transactions.create(orderSlots('funnel-b'), 's-1');

      expect(store.count('orders')).toBe(2);
    });

    it('should refuse a completed funnel whose record has gone', async () => {
      const slots = orderSlots();
      slots.recordCreated = true;

      await expect(transactions.create(slots, 's-1')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should warn but succeed when the notification is not delivered', async () => {
      notifier.notify.mockResolvedValueOnce(false);
      const result = await transactions.create(orderSlots(), 's-1');

      expect(result).toMatchObject({ success: true, warnings: [NOTIFICATION_WARNING] });
      expect(store.count('orders')).toBe(1);
    });

    it('should treat a throwing notifier the same as a failed delivery', async () => {
      notifier.notify.mockRejectedValueOnce(new Error('smtp down'));
      const result = await transactions.create(orderSlots(), 's-1');

      expect(result).toMatchObject({ success: true, warnings: [NOTIFICATION_WARNING] });
    });

    it('should raise a PersistenceError and leave the funnel open when the write fails', async () => {
      jest.spyOn(store, 'put').mockRejectedValueOnce(new Error('disk full'));
      const slots = orderSlots();

      await expect(transactions.create(slots, 's-1')).rejects.toBeInstanceOf(PersistenceError);
      expect(slots.recordCreated).toBe(false);
      expect(slots.recordId).toBeUndefined();
      expect(notifier.notify).not.toHaveBeenCalled();
    });

    it('should record finance terms on the order', async () => {
      const slots = orderSlots();
      slots.financeType = 'hp';
      slots.financeQuote = {
        product: 'hp',
        productName: 'Hire Purchase',
        annualRatePercent: 4.9,
        monthlyPayment: 3000,
        totalCost: 220000,
        termMonths: 60,
        deposit: 40000,
        totalInterest: 20000,
        provider: 'Test Finance',
        rating: 4.5,
        keyFeatures: [],
      };

      const result = await transactions.create(slots, 's-1');

      if (!result.success || !('orderId' in result.record)) throw new Error('expected an order');
      expect(result.record.totalAmount).toBe(220000);
      expect(result.record.finance?.productName).toBe('Hire Purchase');
      expect(transactions.summaryLines(result.record)[2]).toBe('Payment: Hire Purchase, £3,000.00/month over 60 months');
    });

    it('should book an appointment in the customer time zone', async () => {
      const slots = serviceSlots();
      slots.appointmentDateTime = '2026-06-16T14:00:00.000+01:00';

      const result = await transactions.create(slots, 's-1');

      if (!result.success || !('appointmentId' in result.record)) throw new Error('expected an appointment');
      expect(result.recordId).toMatch(/^SVC-RA-2026-/);
      expect(result.record.appointment).toEqual({
        date: '2026-06-16',
        time: '14:00',
        datetime: '2026-06-16T14:00:00.000+01:00',
        durationEstimate: '2 hours',
      });
      expect(result.record.service).toEqual({
        type: 'brake_service',
        description: 'brakes squealing',
        estimatedDurationHours: 2,
      });
      expect(transactions.summaryLines(result.record)).toEqual([
        'Vehicle: 2022 Ferrari Roma',
        'Service: Brake service (2 hours)',
        'Provider: Test Motors, London',
        'When: 2026-06-16 at 14:00',
        'Estimated cost: £960',
      ]);
      expect(notifier.notify).toHaveBeenCalledWith('siya@example.com', 'appointment_confirmation', expect.any(Object));
    });

    it('should price a listing from the valuation', async () => {
      const result = await transactions.create(listingSlots(), 's-1');

      if (!result.success || !('listingId' in result.record)) throw new Error('expected a listing');
      const listing = result.record;
      expect(listing.pricing).toEqual({
        askingPrice: 78960,
        valuation: { tradeIn: 65800, privateSale: 78960, retail: 90804 },
        negotiable: true,
      });
      expect(listing.listing.title).toBe('2021 Porsche 911');
      expect(listing.expiresAt.startsWith('2026-09-08')).toBe(true);
      expect(transactions.summaryLines(listing)).toEqual([
        'Vehicle: 2021 Porsche 911',
        'Mileage: 20,000 miles',
        'Asking price: £78,960',
        'Listed on: AutoTrader',
      ]);
    });
  });

  describe('records', () => {
    it('should move a record through its status lifecycle', async () => {
      const created = await transactions.create(orderSlots(), 's-1');
      if (!created.success) throw new Error('expected success');

      now = new Date('2026-06-11T10:00:00.000Z');
      const confirmed = await transactions.updateStatus('order', created.recordId, 'confirmed');

      expect(confirmed.status).toBe('confirmed');
      expect(confirmed.updatedAt).toBe('2026-06-11T10:00:00.000Z');
      expect(confirmed.notes[1]).toEqual({
        status: 'confirmed',
        note: 'Status changed to confirmed',
        timestamp: '2026-06-11T10:00:00.000Z',
      });
      await expect(transactions.updateStatus('order', created.recordId, 'pending')).rejects.toThrow(
        `Cannot move order ${created.recordId} from confirmed to pending`
      );
    });

    it('should reject updates to unknown records', async () => {
      await expect(transactions.updateStatus('order', 'ORD-RA-2026-AAAAA', 'confirmed')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject illegal transitions', async () => {
      const created = await transactions.create(orderSlots(), 's-1');
      if (!created.success) throw new Error('expected success');
      await transactions.updateStatus('order', created.recordId, 'cancelled');

      await expect(transactions.updateStatus('order', created.recordId, 'confirmed')).rejects.toBeInstanceOf(ValidationError);
    });

    it('should list a customer records newest first', async () => {
      const older = await transactions.create(orderSlots('funnel-a'), 's-1');
      now = new Date('2026-06-12T09:00:00.000Z');
      const newer = await transactions.create(orderSlots('funnel-b'), 's-1');
      if (!older.success || !newer.success) throw new Error('expected success');

      const records = await transactions.listByEmail('order', ' JOHN@x.com ');

      expect(records.map(recordIdOf)).toEqual([newer.recordId, older.recordId]);
      expect(records.map(kindOf)).toEqual(['order', 'order']);
    });

    it('should issue ids in the reference format', async () => {
      const created = await transactions.create(listingSlots(), 's-1');
      if (!created.success) throw new Error('expected success');

      expect(RECORD_ID_PATTERN.test(created.recordId)).toBe(true);
      expect(created.recordId.startsWith('LST-RA-2026-')).toBe(true);
    });
  });
});
