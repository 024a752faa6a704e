/**
 * Loan status constants
 * Prevents typos and ensures consistency across the application
 */
export const LoanStatus = {
  ACTIVE: 'active',
  OVERDUE: 'overdue',
  PAID: 'paid',
  DEFAULTED: 'defaulted',
  RENEWED: 'renewed',
  CONFISCATED: 'confiscated',
} as const;

export type LoanStatusType = typeof LoanStatus[keyof typeof LoanStatus];

/**
 * Statuses that no longer accept payments
 */
export const NON_PAYABLE_LOAN_STATUSES: readonly LoanStatusType[] = [
  LoanStatus.PAID,
  LoanStatus.CONFISCATED,
];

export const PaymentPlanType = {
  SINGLE: 'single',
  MINIMUM_PAYMENT: 'minimum_payment',
  INSTALLMENTS: 'installments',
} as const;

export type PaymentPlanTypeType = typeof PaymentPlanType[keyof typeof PaymentPlanType];

/**
 * Payment status constants
 */
export const PaymentStatus = {
  COMPLETED: 'completed',
  PENDING: 'pending',
  REVERSED: 'reversed',
  FAILED: 'failed',
} as const;

export type PaymentStatusType = typeof PaymentStatus[keyof typeof PaymentStatus];

export const PaymentMethod = {
  CASH: 'cash',
  CARD: 'card',
  TRANSFER: 'transfer',
  CHECK: 'check',
  OTHER: 'other',
} as const;

export type PaymentMethodType = typeof PaymentMethod[keyof typeof PaymentMethod];

export const PAYMENT_METHODS: readonly PaymentMethodType[] = Object.values(PaymentMethod);

/**
 * Collateral (pawned item) status values written by the settlement engines
 */
export const ItemStatus = {
  AVAILABLE: 'available',
  COLLATERAL: 'collateral',
} as const;

export type ItemStatusType = typeof ItemStatus[keyof typeof ItemStatus];

export const OutboxEventType = {
  CUSTOMER_TOTAL_PAID_ADJUSTED: 'customer.total_paid.adjusted',
} as const;

export type OutboxEventTypeType = typeof OutboxEventType[keyof typeof OutboxEventType];
