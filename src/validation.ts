import { ExpenseDraft, FieldValidation } from './types';

const LETTERS_ONLY = /^\p{L}+$/u;
const DATE_FORMAT = /^\d{4}-\d{2}-\d{2}$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/;
const MIN_DESCRIPTION_LENGTH = 5;

export function validateCategory(category: string): FieldValidation {
  if (!category) {
    return { valid: false, code: 'EmptyInput', message: 'Category cannot be empty.' };
  }
  if (!LETTERS_ONLY.test(category)) {
    return { valid: false, code: 'FormatError', message: 'Category must contain only letters.' };
  }
  return { valid: true };
}

/** Reads a form value as a number; `undefined` when it is not one. */
export function toAmount(value: unknown): number | undefined {
  let amount: number;
  if (typeof value === 'number') {
    amount = value;
  } else if (typeof value === 'string' && DECIMAL.test(value.trim())) {
    // Plain decimals only; Number() would also take hex, binary and exponents
    amount = Number(value.trim());
  } else {
    return undefined;
  }
  return Number.isFinite(amount) ? amount : undefined;
}

export function validateAmount(value: unknown): FieldValidation {
  const amount = toAmount(value);
  if (amount === undefined) {
    return { valid: false, code: 'NonNumeric', message: 'Amount must be a valid number.' };
  }
  if (amount <= 0) {
    return { valid: false, code: 'RangeError', message: 'Amount must be greater than 0.' };
  }
  return { valid: true };
}

export function validateDescription(description: string): FieldValidation {
  if (!description) {
    return { valid: false, code: 'EmptyInput', message: 'Description cannot be empty.' };
  }
  // Count code points so an emoji is one character
  if ([...description].length < MIN_DESCRIPTION_LENGTH) {
    return {
      valid: false,
      code: 'TooShort',
      message: `Description must be at least ${MIN_DESCRIPTION_LENGTH} characters.`
    };
  }
  return { valid: true };
}

export function validateDate(date: string): FieldValidation {
  const invalid: FieldValidation = {
    valid: false,
    code: 'FormatError',
    message: 'Date must be in YYYY-MM-DD format.'
  };
  if (!DATE_FORMAT.test(date)) return invalid;

  // Reject dates the calendar does not have, e.g. 2023-02-30
  const [year, month, day] = date.split('-').map(Number);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    return invalid;
  }
  return { valid: true };
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

export type DraftResult =
  | { valid: true; draft: ExpenseDraft }
  | { valid: false; errors: string[] };

// Checks the shape of an untyped request body; field rules are applied by the repository,
// which sees category and description exactly as submitted
export function readExpenseDraft(input: unknown): DraftResult {
  if (!input || typeof input !== 'object') {
    return { valid: false, errors: ['Request body must be a valid JSON object'] };
  }

  const data = input as Record<string, unknown>;
  const errors: string[] = [];
  const { category, amount, description, date } = data;

  if (category === undefined || category === null) {
    errors.push('Category is required');
  } else if (typeof category !== 'string') {
    errors.push('Category must be a string');
  }

  if (amount === undefined || amount === null) {
    errors.push('Amount is required');
  } else if (typeof amount !== 'number' && typeof amount !== 'string') {
    errors.push('Amount must be a number');
  }

  if (description === undefined || description === null) {
    errors.push('Description is required');
  } else if (typeof description !== 'string') {
    errors.push('Description must be a string');
  }

  if (date !== undefined && typeof date !== 'string') {
    errors.push('Date must be a string');
  }

  if (
    errors.length > 0 ||
    typeof category !== 'string' ||
    (typeof amount !== 'number' && typeof amount !== 'string') ||
    typeof description !== 'string' ||
    (date !== undefined && typeof date !== 'string')
  ) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    draft: {
      category,
      amount,
      description,
      date: date?.trim()
    }
  };
}
