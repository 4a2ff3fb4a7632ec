// Expense types
export interface Expense {
  id: string;
  user_id: string;
  description: string;
  amount: number; // Stored as integer cents to avoid floating point drift in sums
  category: string;
  date: string; // ISO date string (YYYY-MM-DD)
  time: string; // HH:MM, or '' when unknown
  created_at: string; // ISO timestamp
}

export interface CreateExpenseInput {
  amount: number; // Input as decimal (e.g., 12.50)
  category: string;
  description: string;
  date: string;
  time?: string;
}

export interface ExpenseResponse {
  id: string;
  description: string;
  amount: number; // Returned as decimal for display
  category: string;
  date: string;
  time: string;
}

// Account types
export interface User {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: string;
}

export interface RegisterInput {
  username: string;
  email: string;
  password: string;
}

export interface LoginInput {
  username: string;
  password: string;
}

export interface UserResponse {
  username: string;
  email: string;
}

// Statistics types
export type StatsPeriod = 'all' | 'daily' | 'weekly' | 'monthly';

export interface ExpenseStats {
  total_spent: number;
  weekly_spent: number;
  monthly_spent: number;
  category_stats: Record<string, number>;
  breakdown: Record<string, number>;
  period: string; // Echo of the requested selector, recognised or not
}

export interface ApiError {
  error: string;
  details?: string[];
}

export interface AuthResult {
  success: boolean;
  message?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}
