import { applyAllocation, assertPayable, isFullyPaid, remainingBalance, restoreAllocation } from './loan.aggregate';
import { LedgerInvariantException, LoanNotPayableException } from '../../common/errors/settlement.errors';
import { LoanStatus } from '../../common/utils/constants/status.constants';
import { buildLoan, buildPayment, FIXED_NOW } from '../../../test/support/fixtures';

describe('loan aggregate', () => {
  it('sums the three balances', () => {
    expect(remainingBalance(buildLoan())).toBe(560);
    expect(isFullyPaid(buildLoan())).toBe(false);
    expect(isFullyPaid(buildLoan({ lateFeeRemaining: 0, interestRemaining: 0, principalRemaining: 0 }))).toBe(true);
  });

  describe('assertPayable', () => {
    it.each([LoanStatus.ACTIVE, LoanStatus.OVERDUE, LoanStatus.DEFAULTED, LoanStatus.RENEWED])(
      'accepts payments while %s',
      (status) => {
        expect(() => assertPayable(buildLoan({ status }))).not.toThrow();
      },
    );

    it.each([LoanStatus.PAID, LoanStatus.CONFISCATED])('rejects payments while %s', (status) => {
      expect(() => assertPayable(buildLoan({ status }))).toThrow(LoanNotPayableException);
    });
  });

  describe('applyAllocation', () => {
    it('takes the splits off each bucket and tracks amount paid', () => {
      const loan = applyAllocation(
        buildLoan(),
        { lateFeeApplied: 10, interestApplied: 50, principalApplied: 40 },
        100,
        'user-1',
        FIXED_NOW,
      );

      expect(loan.lateFeeRemaining).toBe(0);
      expect(loan.interestRemaining).toBe(0);
      expect(loan.principalRemaining).toBe(460);
      expect(loan.amountPaid).toBe(100);
      expect(loan.status).toBe(LoanStatus.ACTIVE);
      expect(loan.paidDate).toBeNull();
      expect(loan.updatedBy).toBe('user-1');
    });

    it('marks the loan paid when nothing is left', () => {
      const loan = applyAllocation(
        buildLoan(),
        { lateFeeApplied: 10, interestApplied: 50, principalApplied: 500 },
        560,
        'user-1',
        FIXED_NOW,
      );

      expect(loan.status).toBe(LoanStatus.PAID);
      expect(loan.paidDate).toEqual(FIXED_NOW);
    });

    it('refuses to drive a bucket negative', () => {
      expect(() =>
        applyAllocation(
          buildLoan({ interestRemaining: 5 }),
          { lateFeeApplied: 0, interestApplied: 6, principalApplied: 0 },
          6,
          'user-1',
          FIXED_NOW,
        ),
      ).toThrow(LedgerInvariantException);
    });

    it('does not mutate its input', () => {
      const original = buildLoan();
      applyAllocation(original, { lateFeeApplied: 10, interestApplied: 0, principalApplied: 0 }, 10, 'u', FIXED_NOW);
      expect(original.lateFeeRemaining).toBe(10);
    });
  });

  describe('restoreAllocation', () => {
    it('adds the splits back and reactivates a paid loan', () => {
      const paid = buildLoan({
        lateFeeRemaining: 0,
        interestRemaining: 0,
        principalRemaining: 0,
        amountPaid: 560,
        status: LoanStatus.PAID,
        paidDate: FIXED_NOW,
      });
      const payment = buildPayment({ amount: 560, lateFeeAmount: 10, interestAmount: 50, principalAmount: 500 });

      const loan = restoreAllocation(paid, payment, 'user-2');

      expect(loan.lateFeeRemaining).toBe(10);
      expect(loan.interestRemaining).toBe(50);
      expect(loan.principalRemaining).toBe(500);
      expect(loan.amountPaid).toBe(0);
      expect(loan.status).toBe(LoanStatus.ACTIVE);
      expect(loan.paidDate).toBeNull();
      expect(loan.updatedBy).toBe('user-2');
    });

    it('keeps a non-paid status as it is', () => {
      const loan = restoreAllocation(
        buildLoan({ status: LoanStatus.OVERDUE, amountPaid: 100 }),
        buildPayment(),
        'user-2',
      );
      expect(loan.status).toBe(LoanStatus.OVERDUE);
    });

    it('refuses to take amount paid below zero', () => {
      expect(() => restoreAllocation(buildLoan({ amountPaid: 50 }), buildPayment({ amount: 100 }), 'u')).toThrow(
        LedgerInvariantException,
      );
    });

    it('undoes applyAllocation exactly', () => {
      const before = buildLoan({ lateFeeRemaining: 12.35, interestRemaining: 40.1, principalRemaining: 300 });
      const allocation = { lateFeeApplied: 12.35, interestApplied: 40.1, principalApplied: 20.05 };
      const after = applyAllocation(before, allocation, 72.5, 'u', FIXED_NOW);
      const restored = restoreAllocation(
        after,
        buildPayment({ amount: 72.5, lateFeeAmount: 12.35, interestAmount: 40.1, principalAmount: 20.05 }),
        'u',
      );

      expect(restored.lateFeeRemaining).toBe(before.lateFeeRemaining);
      expect(restored.interestRemaining).toBe(before.interestRemaining);
      expect(restored.principalRemaining).toBe(before.principalRemaining);
      expect(restored.amountPaid).toBe(before.amountPaid);
      expect(restored.status).toBe(before.status);
    });
  });
});
