import {
  validateCategory,
  validateAmount,
  validateDescription,
  validateDate,
  capitalize,
  readExpenseDraft
} from './validation';

describe('validateCategory', () => {
  it('should accept letters only', () => {
    expect(validateCategory('Food')).toEqual({ valid: true });
    expect(validateCategory('café')).toEqual({ valid: true });
  });

  it('should reject empty input', () => {
    expect(validateCategory('')).toEqual({
      valid: false,
      code: 'EmptyInput',
      message: 'Category cannot be empty.'
    });
  });

  it.each(['Food2', 'Eating out', 'Food!', 'bus-fare', ' '])('should reject %j', (category) => {
    const result = validateCategory(category);
    expect(result).toEqual({
      valid: false,
      code: 'FormatError',
      message: 'Category must contain only letters.'
    });
  });
});

describe('validateAmount', () => {
  it.each([0.01, 1, 100.5, '12.5'])('should accept %j', (amount) => {
    expect(validateAmount(amount)).toEqual({ valid: true });
  });

  it('should reject zero amount', () => {
    expect(validateAmount(0)).toEqual({
      valid: false,
      code: 'RangeError',
      message: 'Amount must be greater than 0.'
    });
  });

  it('should reject negative amount', () => {
    const result = validateAmount(-10);
    expect(result.valid).toBe(false);
    expect(!result.valid && result.code).toBe('RangeError');
  });

  it.each(['-3', '0.0'])('should report %j as out of range', (amount) => {
    const result = validateAmount(amount);
    expect(!result.valid && result.code).toBe('RangeError');
  });

  it.each(['12.', '.5', ' 7 '])('should accept the decimal string %j', (amount) => {
    expect(validateAmount(amount)).toEqual({ valid: true });
  });

  it.each(['abc', '', NaN, Infinity, null, undefined, {}, '0x1A', '0b11', '1e3', '1,000'])('should reject non-numeric %p', (amount) => {
    expect(validateAmount(amount)).toEqual({
      valid: false,
      code: 'NonNumeric',
      message: 'Amount must be a valid number.'
    });
  });
});

describe('validateDescription', () => {
  it('should accept five characters or more', () => {
    expect(validateDescription('lunch')).toEqual({ valid: true });
    expect(validateDescription('bus fare to work')).toEqual({ valid: true });
  });

  it('should reject empty description', () => {
    expect(validateDescription('')).toEqual({
      valid: false,
      code: 'EmptyInput',
      message: 'Description cannot be empty.'
    });
  });

  it('should reject descriptions shorter than five characters', () => {
    expect(validateDescription('taxi')).toEqual({
      valid: false,
      code: 'TooShort',
      message: 'Description must be at least 5 characters.'
    });
  });

  it('should count whitespace as submitted', () => {
    expect(validateDescription('  abc  ')).toEqual({ valid: true });
    expect(validateDescription('     ')).toEqual({ valid: true });
  });

  it('should count an emoji as one character', () => {
    const result = validateDescription('cafe☕');
    expect(result.valid).toBe(true);
    expect(validateDescription('tea🍵').valid).toBe(false);
  });
});

describe('validateDate', () => {
  it('should accept a real calendar date', () => {
    expect(validateDate('2024-02-29')).toEqual({ valid: true });
  });

  it.each(['15-01-2024', '2024-1-5', '2023-02-29', '2024-13-01', ''])('should reject %j', (date) => {
    expect(validateDate(date)).toEqual({
      valid: false,
      code: 'FormatError',
      message: 'Date must be in YYYY-MM-DD format.'
    });
  });
});

describe('capitalize', () => {
  it('should upper-case the first letter and lower-case the rest', () => {
    expect(capitalize('food')).toBe('Food');
    expect(capitalize('tRANSPORT')).toBe('Transport');
    expect(capitalize('')).toBe('');
  });
});

describe('readExpenseDraft', () => {
  const validInput = {
    amount: 100.5,
    category: 'Food',
    description: 'Lunch at restaurant',
    date: '2024-01-15'
  };

  it('should read a well-formed body', () => {
    expect(readExpenseDraft(validInput)).toEqual({ valid: true, draft: validInput });
  });

  it('should trim only the date', () => {
    const result = readExpenseDraft({
      amount: '42',
      category: ' food',
      description: '  abc  ',
      date: ' 2024-01-15 '
    });
    expect(result).toEqual({
      valid: true,
      draft: { amount: '42', category: ' food', description: '  abc  ', date: '2024-01-15' }
    });
  });

  it('should leave date undefined when omitted', () => {
    const { date: _date, ...withoutDate } = validInput;
    const result = readExpenseDraft(withoutDate);
    expect(result.valid && result.draft.date).toBeUndefined();
  });

  it('should reject null input', () => {
    expect(readExpenseDraft(null)).toEqual({
      valid: false,
      errors: ['Request body must be a valid JSON object']
    });
  });

  it('should report every missing or mistyped field', () => {
    const result = readExpenseDraft({ category: 7, amount: true, date: 20240115 });
    expect(result).toEqual({
      valid: false,
      errors: [
        'Category must be a string',
        'Amount must be a number',
        'Description is required',
        'Date must be a string'
      ]
    });
  });
});
