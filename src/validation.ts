import { isValidIsoDate, isValidTimeOfDay } from './dates';
import {
  CreateExpenseInput,
  LoginInput,
  RegisterInput,
  ValidationResult
} from './types';

const MAX_AMOUNT = 100000000;
const MAX_DESCRIPTION_LENGTH = 200;
const MAX_CATEGORY_LENGTH = 50;
const MAX_USERNAME_LENGTH = 80;
const MAX_EMAIL_LENGTH = 120;
const MAX_PASSWORD_LENGTH = 128;

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

/** Amounts arrive as JSON numbers or as numeric strings from form posts. */
function toAmount(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return null;
}

function checkText(
  errors: string[],
  value: unknown,
  label: string,
  maxLength: number
): void {
  if (value === undefined || value === null || value === '') {
    errors.push(`${label} is required`);
  } else if (typeof value !== 'string') {
    errors.push(`${label} must be a string`);
  } else if (value.trim().length === 0) {
    errors.push(`${label} cannot be empty`);
  } else if (value.trim().length > maxLength) {
    errors.push(`${label} must be ${maxLength} characters or less`);
  }
}

export function validateExpenseInput(input: unknown): ValidationResult {
  const errors: string[] = [];

  if (!isRecord(input)) {
    return { valid: false, errors: ['Request body must be a valid JSON object'] };
  }

  // Validate amount
  const amount = toAmount(input.amount);
  if (input.amount === undefined || input.amount === null) {
    errors.push('Amount is required');
  } else if (amount === null || !Number.isFinite(amount)) {
    errors.push('Amount must be a valid number');
  } else if (amount < 0) {
    errors.push('Amount cannot be negative');
  } else if (amount > MAX_AMOUNT) {
    errors.push('Amount exceeds maximum allowed value');
  } else {
    // Check for reasonable decimal places (max 2 for currency)
    const decimalParts = amount.toString().split('.');
    if (decimalParts[1] && decimalParts[1].length > 2) {
      errors.push('Amount can have at most 2 decimal places');
    }
  }

  checkText(errors, input.category, 'Category', MAX_CATEGORY_LENGTH);
  checkText(errors, input.description, 'Description', MAX_DESCRIPTION_LENGTH);

  // Validate date
  if (!input.date) {
    errors.push('Date is required');
  } else if (typeof input.date !== 'string') {
    errors.push('Date must be a string');
  } else if (!/^\d{4}-\d{2}-\d{2}$/.test(input.date.trim())) {
    errors.push('Date must be in YYYY-MM-DD format');
  } else if (!isValidIsoDate(input.date.trim())) {
    errors.push('Date is not a valid date');
  }

  // Time is optional; an empty string means unknown
  if (input.time !== undefined && input.time !== null && input.time !== '') {
    if (typeof input.time !== 'string') {
      errors.push('Time must be a string');
    } else if (!isValidTimeOfDay(input.time.trim())) {
      errors.push('Time must be in HH:MM format');
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Narrow a body that passed validateExpenseInput. Trims strings and rounds the
 * amount to 2 decimal places.
 */
export function sanitizeInput(input: Record<string, unknown>): CreateExpenseInput {
  const text = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

  return {
    amount: Math.round((toAmount(input.amount) ?? 0) * 100) / 100,
    category: text(input.category),
    description: text(input.description),
    date: text(input.date),
    time: text(input.time)
  };
}

export function validateRegisterInput(input: unknown): ValidationResult {
  if (!isRecord(input)) {
    return { valid: false, errors: ['Request body must be a valid JSON object'] };
  }

  const errors: string[] = [];
  checkText(errors, input.username, 'Username', MAX_USERNAME_LENGTH);
  checkText(errors, input.email, 'Email', MAX_EMAIL_LENGTH);
  if (typeof input.email === 'string' && input.email.trim() && !input.email.includes('@')) {
    errors.push('Email must be a valid email address');
  }
  checkText(errors, input.password, 'Password', MAX_PASSWORD_LENGTH);

  return { valid: errors.length === 0, errors };
}

export function toRegisterInput(input: Record<string, unknown>): RegisterInput {
  return {
    username: typeof input.username === 'string' ? input.username.trim() : '',
    email: typeof input.email === 'string' ? input.email.trim().toLowerCase() : '',
    password: typeof input.password === 'string' ? input.password : ''
  };
}

/** Login never explains which field was wrong; anything unusable is just a failed login. */
export function toLoginInput(input: unknown): LoginInput | null {
  if (!isRecord(input)) return null;
  const { username, password } = input;
  if (typeof username !== 'string' || typeof password !== 'string') return null;
  return { username: username.trim(), password };
}

export function isJsonObject(input: unknown): input is Record<string, unknown> {
  return isRecord(input);
}
