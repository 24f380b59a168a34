import fs from 'fs';
import path from 'path';
import { Expense, StoreStatus } from './types';

const EXPENSES_FILE = process.env.EXPENSES_FILE || './data/expenses.json';

export interface RecordStore {
  load(): Expense[];
  save(expenses: Expense[]): void;
  inspect(): StoreStatus;
}

function isExpense(value: unknown): value is Expense {
  if (!value || typeof value !== 'object') return false;
  const record = value as Record<string, unknown>;
  return (
    typeof record.Category === 'string' &&
    typeof record.Amount === 'number' &&
    typeof record.Description === 'string' &&
    typeof record.Date === 'string'
  );
}

type ReadOutcome =
  | { status: 'missing' }
  | { status: 'ok'; expenses: Expense[] }
  | { status: 'corrupt'; reason: string };

function read(filePath: string): ReadOutcome {
  if (!fs.existsSync(filePath)) return { status: 'missing' };

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    return { status: 'corrupt', reason: error instanceof Error ? error.message : String(error) };
  }

  if (!Array.isArray(parsed)) {
    return { status: 'corrupt', reason: 'document is not an array' };
  }
  const expenses: Expense[] = [];
  for (const [position, item] of parsed.entries()) {
    if (!isExpense(item)) {
      return { status: 'corrupt', reason: `record ${position} is malformed` };
    }
    expenses.push(item);
  }
  return { status: 'ok', expenses };
}

/**
 * Keeps the whole collection as one JSON document.
 *
 * A missing or unreadable document loads as an empty collection; `inspect`
 * tells the two apart for callers that want to report it. Saving over an
 * unreadable document copies it to `<file>.corrupt` first.
 */
export function createJsonFileStore(filePath: string = EXPENSES_FILE): RecordStore {
  return {
    load(): Expense[] {
      const outcome = read(filePath);
      if (outcome.status === 'corrupt') {
        console.warn(`Expense store ${filePath} is unreadable (${outcome.reason}); treating it as empty`);
        return [];
      }
      return outcome.status === 'ok' ? outcome.expenses : [];
    },

    save(expenses: Expense[]): void {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });

      // A corrupt document would otherwise be lost on the first write after it
      if (read(filePath).status === 'corrupt') {
        const backupPath = `${filePath}.corrupt`;
        fs.copyFileSync(filePath, backupPath);
        console.warn(`Kept unreadable expense store as ${backupPath} before overwriting it`);
      }

      // Write beside the target and rename so readers never see half a document
      const tempPath = `${filePath}.tmp`;
      fs.writeFileSync(tempPath, JSON.stringify(expenses, null, 4), 'utf8');
      fs.renameSync(tempPath, filePath);
    },

    inspect(): StoreStatus {
      return read(filePath).status;
    }
  };
}

export const store = createJsonFileStore();

export default store;
