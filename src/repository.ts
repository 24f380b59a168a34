import { RecordStore } from './store';
import { validateAmount, validateCategory, validateDate, validateDescription, capitalize, toAmount } from './validation';
import { AddResult, DeleteResult, Expense, ExpenseDraft, FieldValidation } from './types';

export interface RepositoryOptions {
  today?: () => Date;
}

export interface ExpenseRepository {
  load(): Expense[];
  add(draft: ExpenseDraft): AddResult;
  deleteAt(index: number): DeleteResult;
  clearAll(): void;
}

// Local calendar date, not UTC, so a late-evening entry keeps its own day
export function formatDate(value: Date): string {
  const month = String(value.getMonth() + 1).padStart(2, '0');
  const day = String(value.getDate()).padStart(2, '0');
  return `${value.getFullYear()}-${month}-${day}`;
}

export function createExpenseRepository(
  store: RecordStore,
  options: RepositoryOptions = {}
): ExpenseRepository {
  const today = options.today ?? (() => new Date());

  return {
    load(): Expense[] {
      return store.load();
    },

    add(draft: ExpenseDraft): AddResult {
      // First failure wins: category, amount, description, then date
      const checks: Array<() => FieldValidation> = [
        () => validateCategory(draft.category),
        () => validateAmount(draft.amount),
        () => validateDescription(draft.description)
      ];
      if (draft.date !== undefined) {
        const date = draft.date;
        checks.push(() => validateDate(date));
      }
      for (const check of checks) {
        const result = check();
        if (!result.valid) {
          return { ok: false, error: { code: result.code, message: result.message } };
        }
      }

      const amount = Math.trunc(toAmount(draft.amount) ?? 0);
      if (amount < 1) {
        return {
          ok: false,
          error: { code: 'RangeError', message: 'Amount must be at least 1 after truncation.' }
        };
      }

      const expense: Expense = {
        Category: capitalize(draft.category),
        Amount: amount,
        Description: draft.description,
        Date: draft.date ?? formatDate(today())
      };

      const expenses = store.load();
      expenses.push(expense);
      store.save(expenses);

      return { ok: true, expense, index: expenses.length - 1 };
    },

    deleteAt(index: number): DeleteResult {
      const expenses = store.load();
      if (!Number.isInteger(index) || index < 0 || index >= expenses.length) {
        return { ok: false, error: { code: 'IndexError', message: `No expense at position ${index}.` } };
      }

      const [removed] = expenses.splice(index, 1);
      store.save(expenses);
      return { ok: true, removed };
    },

    clearAll(): void {
      store.save([]);
    }
  };
}
