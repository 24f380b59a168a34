// Expense types
export interface Expense {
  Category: string; // Capitalized, letters only
  Amount: number; // Whole currency units
  Description: string;
  Date: string; // ISO date string (YYYY-MM-DD)
}

// What a caller submits; amount may still be a numeric string from a form field
export interface ExpenseDraft {
  category: string;
  amount: number | string;
  description: string;
  date?: string;
}

export type ErrorCode =
  | 'EmptyInput'
  | 'FormatError'
  | 'NonNumeric'
  | 'RangeError'
  | 'TooShort'
  | 'IndexError'
  | 'StorageCorrupt';

export interface ExpenseError {
  code: ErrorCode;
  message: string;
}

export type FieldValidation = { valid: true } | ({ valid: false } & ExpenseError);

export type AddResult =
  | { ok: true; expense: Expense; index: number }
  | { ok: false; error: ExpenseError };

export type DeleteResult =
  | { ok: true; removed: Expense }
  | { ok: false; error: ExpenseError };

export type StoreStatus = 'missing' | 'ok' | 'corrupt';

export interface ExpenseSummary {
  count: number;
  total: number;
  average: number | undefined;
  max: number | undefined;
}

export interface CategoryStats {
  category: string;
  sum: number;
  count: number;
  average: number;
}

export interface MonthlyStats {
  month: string; // YYYY-MM
  total: number;
  count: number;
}

export interface CategoryShare {
  category: string;
  total: number;
  share: number; // Fraction of the grand total, 0..1
}

export interface TrendPoint extends Expense {
  cumulative: number;
}

export interface IndexedExpense extends Expense {
  index: number; // Position in load order
}

export interface ApiError {
  error: string;
  code?: ErrorCode;
  details?: string[];
}
