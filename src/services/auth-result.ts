import { AuthFailure, AuthResult } from '../types';

export function succeed<T>(message: string, data: T): AuthResult<T> {
  return { success: true, message, data };
}

export function succeedEmpty(message: string): AuthResult {
  return { success: true, message, data: undefined };
}

export function fail<T = undefined>(message: string, error: AuthFailure): AuthResult<T> {
  return { success: false, message, error };
}

export function storageFailure<T = undefined>(): AuthResult<T> {
  return fail<T>('Secure storage is unavailable. Please sign in again.', { kind: 'StorageError' });
}
