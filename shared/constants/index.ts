export const APP_NAME = 'Stationery Back Office';
export const APP_VERSION = '1.0.0';

export const DEFAULT_API_PORT = 3001;
export const DEFAULT_DB_PORT = 5432;

export const PAYMENT_METHODS = ['cash', 'card', 'bank_transfer', 'credit'] as const;

export const PAYMENT_METHOD_LABELS = {
  cash: 'Cash',
  card: 'Card',
  bank_transfer: 'Bank Transfer',
  credit: 'Credit',
} as const;

export const DEBT_STATUSES = ['pending', 'partial', 'paid'] as const;

export const EXPENDITURE_CATEGORIES = ['supplies', 'rent', 'utilities', 'salary', 'marketing', 'other'] as const;

export const EXPENDITURE_CATEGORY_LABELS = {
  supplies: 'Supplies',
  rent: 'Rent',
  utilities: 'Utilities',
  salary: 'Salary',
  marketing: 'Marketing',
  other: 'Other',
} as const;

export const UNIT_TYPES = ['carton', 'piece', 'box', 'pack'] as const;

export const MESSAGE_CHANNELS = ['sms', 'whatsapp'] as const;

/** Sentinel item debts fall back to when a sale has nothing to point at */
export const MISC_DEBT_SKU = 'MISC-DEBT';
export const MISC_DEBT_NAME = 'Miscellaneous Debt';

export const DEFAULT_MINIMUM_STOCK = 10;
export const DEFAULT_MINIMUM_CARTONS = 5;

/** Number of most recent days the daily summary shows when no filter is set */
export const UNFILTERED_SUMMARY_DAYS = 2;
/** Cap on error strings returned from a bulk reminder run */
export const BULK_ERROR_LIMIT = 5;
