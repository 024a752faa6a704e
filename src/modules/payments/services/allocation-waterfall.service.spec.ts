import { AllocationWaterfallService } from './allocation-waterfall.service';

describe('AllocationWaterfallService', () => {
  let service: AllocationWaterfallService;

  beforeEach(() => {
    service = new AllocationWaterfallService();
  });

  describe('allocate', () => {
    it('pays late fee, then interest, then principal', () => {
      expect(service.allocate(100, 10, 50, 500)).toEqual({
        lateFeeApplied: 10,
        interestApplied: 50,
        principalApplied: 40,
      });
    });

    it('stops at the late fee when the payment is smaller', () => {
      expect(service.allocate(7.5, 10, 50, 500)).toEqual({
        lateFeeApplied: 7.5,
        interestApplied: 0,
        principalApplied: 0,
      });
    });

    it('covers interest before touching principal', () => {
      expect(service.allocate(35, 0, 50, 500)).toEqual({
        lateFeeApplied: 0,
        interestApplied: 35,
        principalApplied: 0,
      });
    });

    it('pays everything off with an exact payment', () => {
      expect(service.allocate(560, 10, 50, 500)).toEqual({
        lateFeeApplied: 10,
        interestApplied: 50,
        principalApplied: 500,
      });
    });

    it('never allocates more than is owed', () => {
      const allocation = service.allocate(1000, 10, 50, 500);
      expect(allocation.principalApplied).toBe(500);
    });

    it('keeps cents exact', () => {
      expect(service.allocate(0.3, 0.1, 0.1, 100)).toEqual({
        lateFeeApplied: 0.1,
        interestApplied: 0.1,
        principalApplied: 0.1,
      });
    });

    it('returns zero splits for a zero payment', () => {
      expect(service.allocate(0, 10, 50, 500)).toEqual({
        lateFeeApplied: 0,
        interestApplied: 0,
        principalApplied: 0,
      });
    });
  });

  describe('totalOwed', () => {
    it('sums the three buckets', () => {
      expect(
        service.totalOwed({ lateFeeRemaining: 10, interestRemaining: 50, principalRemaining: 500 }),
      ).toBe(560);
    });
  });
});
