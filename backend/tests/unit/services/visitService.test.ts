import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { createMockKnex, fixedClock, TIMEZONE, type MockKnex } from '../../helpers/mockKnex.js';
import {
  CUSTOMER_ID,
  SERVICE_ID,
  VISIT_ID,
  customerRecord,
  serviceRecord,
  visitRecord,
} from '../../fixtures/records.js';

// ── Mock logger ─────────────────────────────────────────────────────

jest.unstable_mockModule('../../../src/utils/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const { createVisitService } = await import('../../../src/services/visitService.js');
const { InvalidStateError, NotFoundError, StorageError, ValidationError } = await import(
  '../../../src/utils/errors.js'
);
const { logger } = await import('../../../src/utils/logger.js');

describe('visitService', () => {
  let mock: MockKnex;
  let service: ReturnType<typeof createVisitService>;

  beforeEach(() => {
    jest.clearAllMocks();
    mock = createMockKnex();
    service = createVisitService({ db: mock.knex, timezone: TIMEZONE, clock: fixedClock });
  });

  describe('recordVisit', () => {
    it('records a paid visit at the service price and advances the counters', async () => {
      mock.enqueue(customerRecord(), serviceRecord(), [visitRecord()], 1);

      const result = await service.recordVisit({
        customerId: CUSTOMER_ID,
        serviceId: SERVICE_ID,
        paymentMethod: 'cash',
      });

      expect(mock.builder.insert).toHaveBeenCalledWith({
        customer_id: CUSTOMER_ID,
        service_id: SERVICE_ID,
        visit_date: '2026-03-15',
        visit_time: '10:30:00',
        amount_paid: 350,
        payment_method: 'cash',
        is_loyalty_reward: false,
        notes: null,
      });
      expect(mock.builder.update).toHaveBeenCalledWith({
        total_visits: 5,
        total_spent: 1550,
        loyalty_points: 5,
        last_visit: '2026-03-15 10:30:00',
      });
      expect(mock.trx.commit).toHaveBeenCalledTimes(1);
      expect(mock.trx.rollback).not.toHaveBeenCalled();

      expect(result.visit).toEqual({
        id: VISIT_ID,
        customerId: CUSTOMER_ID,
        serviceId: SERVICE_ID,
        visitDate: '2026-03-15',
        visitTime: '10:30:00',
        amountPaid: 350,
        paymentMethod: 'cash',
        isLoyaltyReward: false,
        notes: null,
      });
      expect(result.customer).toEqual({
        id: CUSTOMER_ID,
        name: 'Amina Wanjiru',
        totalVisits: 5,
        totalSpent: 1550,
        loyaltyPoints: 5,
        lastVisit: '2026-03-15 10:30:00',
      });
      expect(result.loyalty.eligible).toBe(false);
      expect(result.loyalty.remaining).toBe(5);
    });

    it('runs every query inside the transaction', async () => {
      mock.enqueue(customerRecord(), serviceRecord(), [visitRecord()], 1);

      await service.recordVisit({
        customerId: CUSTOMER_ID,
        serviceId: SERVICE_ID,
        paymentMethod: 'mobile_money',
      });

      expect(mock.db.transaction).toHaveBeenCalledTimes(1);
      expect(mock.db).not.toHaveBeenCalled();
      expect(mock.trx).toHaveBeenCalledWith('customers');
      expect(mock.trx).toHaveBeenCalledWith('services');
      expect(mock.trx).toHaveBeenCalledWith('visits');
    });

    it('locks the customer row before reading its counters', async () => {
      mock.enqueue(customerRecord(), serviceRecord(), [visitRecord()], 1);

      await service.recordVisit({
        customerId: CUSTOMER_ID,
        serviceId: SERVICE_ID,
        paymentMethod: 'cash',
      });

      expect(mock.trx).toHaveBeenNthCalledWith(1, 'customers');
      expect(mock.builder.forUpdate).toHaveBeenCalledTimes(1);
      const lockOrder = mock.builder.forUpdate.mock.invocationCallOrder[0];
      const firstRead = mock.builder.first.mock.invocationCallOrder[0];
      expect(lockOrder).toBeLessThan(firstRead);
    });

    it('does not lock anything when the payment method is rejected', async () => {
      await expect(
        service.recordVisit({ customerId: CUSTOMER_ID, serviceId: SERVICE_ID, paymentMethod: 'cheque' }),
      ).rejects.toThrow(ValidationError);

      expect(mock.db.transaction).not.toHaveBeenCalled();
      expect(mock.builder.forUpdate).not.toHaveBeenCalled();
    });

    it('uses a manual amount for a paid visit', async () => {
      mock.enqueue(customerRecord(), serviceRecord(), [visitRecord({ amount_paid: 280 })], 1);

      await service.recordVisit({
        customerId: CUSTOMER_ID,
        serviceId: SERVICE_ID,
        paymentMethod: 'card',
        amountPaid: 280,
        notes: '  regular discount  ',
      });

      expect(mock.builder.insert).toHaveBeenCalledWith(
        expect.objectContaining({ amount_paid: 280, payment_method: 'card', notes: 'regular discount' }),
      );
      expect(mock.builder.update).toHaveBeenCalledWith(
        expect.objectContaining({ total_spent: 1480 }),
      );
    });

    it('turns 9 points into 10 and reports the reward as earned', async () => {
      mock.enqueue(
        customerRecord({ total_visits: 9, total_spent: '2700.00', loyalty_points: 9 }),
        serviceRecord({ price: '500.00' }),
        [visitRecord({ amount_paid: '500.00' })],
        1,
      );

      const result = await service.recordVisit({
        customerId: CUSTOMER_ID,
        serviceId: SERVICE_ID,
        paymentMethod: 'cash',
      });

      expect(result.customer.loyaltyPoints).toBe(10);
      expect(result.customer.totalSpent).toBe(3200);
      expect(result.loyalty.eligible).toBe(true);
    });

    it('redeems a free wash: amount forced to 0 and points reset', async () => {
      mock.enqueue(
        customerRecord({ total_visits: 10, total_spent: '3200.00', loyalty_points: 10 }),
        serviceRecord(),
        [visitRecord({ amount_paid: '0.00', is_loyalty_reward: true })],
        1,
      );

      const result = await service.recordVisit({
        customerId: CUSTOMER_ID,
        serviceId: SERVICE_ID,
        paymentMethod: 'cash',
        isLoyaltyReward: true,
        amountPaid: 500,
      });

      expect(mock.builder.insert).toHaveBeenCalledWith(
        expect.objectContaining({ amount_paid: 0, is_loyalty_reward: true }),
      );
      expect(mock.builder.update).toHaveBeenCalledWith({
        total_visits: 10,
        total_spent: 3200,
        loyalty_points: 0,
        last_visit: '2026-03-15 10:30:00',
      });
      expect(result.visit.amountPaid).toBe(0);
      expect(result.loyalty.points).toBe(0);
      expect(logger.info).toHaveBeenCalledWith(
        expect.objectContaining({ isLoyaltyReward: true, loyaltyPoints: 0 }),
        'Loyalty reward redeemed',
      );
    });

    it('refuses a free wash below 10 points and writes nothing', async () => {
      mock.enqueue(customerRecord({ loyalty_points: 9 }), serviceRecord());

      await expect(
        service.recordVisit({
          customerId: CUSTOMER_ID,
          serviceId: SERVICE_ID,
          paymentMethod: 'cash',
          isLoyaltyReward: true,
        }),
      ).rejects.toThrow(new InvalidStateError('Free wash not available: 9 of 10 loyalty points'));

      expect(mock.builder.insert).not.toHaveBeenCalled();
      expect(mock.builder.update).not.toHaveBeenCalled();
      expect(mock.trx.rollback).toHaveBeenCalledTimes(1);
      expect(mock.trx.commit).not.toHaveBeenCalled();
    });

    it('fails with NotFound for a missing customer and inserts no visit', async () => {
      mock.enqueue(undefined);

      await expect(
        service.recordVisit({ customerId: CUSTOMER_ID, serviceId: SERVICE_ID, paymentMethod: 'cash' }),
      ).rejects.toThrow(new NotFoundError('Customer not found'));

      expect(mock.builder.insert).not.toHaveBeenCalled();
      expect(mock.trx.rollback).toHaveBeenCalledTimes(1);
    });

    it('fails with NotFound for a missing service and inserts no visit', async () => {
      mock.enqueue(customerRecord(), undefined);

      await expect(
        service.recordVisit({ customerId: CUSTOMER_ID, serviceId: SERVICE_ID, paymentMethod: 'cash' }),
      ).rejects.toThrow(new NotFoundError('Service not found'));

      expect(mock.builder.insert).not.toHaveBeenCalled();
      expect(mock.trx.rollback).toHaveBeenCalledTimes(1);
    });

    it('rejects malformed ids without opening a transaction', async () => {
      await expect(
        service.recordVisit({ customerId: '42', serviceId: SERVICE_ID, paymentMethod: 'cash' }),
      ).rejects.toThrow(NotFoundError);
      await expect(
        service.recordVisit({ customerId: CUSTOMER_ID, serviceId: 'abc', paymentMethod: 'cash' }),
      ).rejects.toThrow(new NotFoundError('Service not found'));

      expect(mock.db.transaction).not.toHaveBeenCalled();
    });

    it('refuses check-ins on an inactive service', async () => {
      mock.enqueue(customerRecord(), serviceRecord({ name: 'Full Detail', is_active: false }));

      await expect(
        service.recordVisit({ customerId: CUSTOMER_ID, serviceId: SERVICE_ID, paymentMethod: 'cash' }),
      ).rejects.toThrow(
        new InvalidStateError('Service "Full Detail" is not available for new check-ins'),
      );

      expect(mock.builder.insert).not.toHaveBeenCalled();
    });

    it('rejects an unknown payment method', async () => {
      await expect(
        service.recordVisit({ customerId: CUSTOMER_ID, serviceId: SERVICE_ID, paymentMethod: 'cheque' }),
      ).rejects.toThrow(
        new ValidationError('Invalid paymentMethod: must be one of cash, mobile_money, card'),
      );

      expect(mock.db.transaction).not.toHaveBeenCalled();
    });

    it('rejects a negative manual amount', async () => {
      await expect(
        service.recordVisit({
          customerId: CUSTOMER_ID,
          serviceId: SERVICE_ID,
          paymentMethod: 'cash',
          amountPaid: -50,
        }),
      ).rejects.toThrow(new ValidationError('amountPaid must be a non-negative number'));
    });

    it('rolls back and reports a storage failure when the insert fails', async () => {
      const dbError = new Error('connection reset');
      mock.enqueue(customerRecord(), serviceRecord(), dbError);

      const attempt = service.recordVisit({
        customerId: CUSTOMER_ID,
        serviceId: SERVICE_ID,
        paymentMethod: 'cash',
      });

      await expect(attempt).rejects.toThrow(new StorageError('Check-in could not be saved'));
      await expect(attempt).rejects.toHaveProperty('cause', dbError);
      expect(mock.builder.update).not.toHaveBeenCalled();
      expect(mock.trx.rollback).toHaveBeenCalledTimes(1);
      expect(mock.trx.commit).not.toHaveBeenCalled();
    });

    it('rolls back when the counter update fails', async () => {
      mock.enqueue(customerRecord(), serviceRecord(), [visitRecord()], new Error('deadlock detected'));

      await expect(
        service.recordVisit({ customerId: CUSTOMER_ID, serviceId: SERVICE_ID, paymentMethod: 'cash' }),
      ).rejects.toThrow(StorageError);

      expect(mock.trx.rollback).toHaveBeenCalledTimes(1);
      expect(mock.trx.commit).not.toHaveBeenCalled();
      expect(logger.info).not.toHaveBeenCalled();
    });
  });

  describe('listRecentVisits', () => {
    it('returns the latest visits with customer and service names', async () => {
      mock.enqueue([
        {
          id: VISIT_ID,
          customer_id: CUSTOMER_ID,
          customer_name: 'Amina Wanjiru',
          plate_number: 'KDA 123A',
          service_id: SERVICE_ID,
          service_name: 'Full Wash',
          visit_date: '2026-03-15',
          visit_time: '10:30:00',
          amount_paid: '350.00',
          payment_method: 'cash',
          is_loyalty_reward: false,
        },
      ]);

      const visits = await service.listRecentVisits();

      expect(mock.builder.limit).toHaveBeenCalledWith(10);
      expect(mock.builder.orderBy).toHaveBeenNthCalledWith(1, 'v.visit_date', 'desc');
      expect(visits).toEqual([
        {
          id: VISIT_ID,
          customerId: CUSTOMER_ID,
          customerName: 'Amina Wanjiru',
          plateNumber: 'KDA 123A',
          serviceId: SERVICE_ID,
          serviceName: 'Full Wash',
          visitDate: '2026-03-15',
          visitTime: '10:30:00',
          amountPaid: 350,
          paymentMethod: 'cash',
          isLoyaltyReward: false,
        },
      ]);
    });

    it('validates the limit', async () => {
      await expect(service.listRecentVisits(0)).rejects.toThrow(
        new ValidationError('limit must be an integer between 1 and 50'),
      );
      await expect(service.listRecentVisits(51)).rejects.toThrow(ValidationError);
    });
  });
});
