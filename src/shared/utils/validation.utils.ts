/**
 * Shared validation utilities
 */

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

const SYMBOL_MAX_LENGTH = 12;

export class ValidationUtils {
  /** Trim and uppercase; the form symbols are stored and compared in. */
  public static normalizeSymbol(symbol: string): string {
    return String(symbol || '').trim().toUpperCase();
  }

  /**
   * Tickers such as AAPL, BRK.B, BTC-USD, ^GSPC and EURUSD=X are accepted.
   */
  public static validateSymbol(symbol: string): ValidationResult {
    const errors: string[] = [];

    if (!symbol || typeof symbol !== 'string') {
      errors.push('Symbol is required');
    } else {
      const trimmed = ValidationUtils.normalizeSymbol(symbol);
      if (trimmed.length === 0) {
        errors.push('Symbol cannot be empty');
      } else if (trimmed.length > SYMBOL_MAX_LENGTH) {
        errors.push(`Symbol cannot exceed ${SYMBOL_MAX_LENGTH} characters`);
      } else if (!/^[A-Z0-9.\-^=]+$/.test(trimmed)) {
        errors.push('Symbol can only contain letters, numbers, dots, dashes, carets and equals signs');
      }
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  public static validateNumeric(value: unknown, fieldName: string, min?: number, max?: number): ValidationResult {
    const errors: string[] = [];

    if (value === undefined || value === null || value === '') {
      errors.push(`${fieldName} is required`);
      return { isValid: false, errors };
    }

    const num = Number(value);
    if (isNaN(num)) {
      errors.push(`${fieldName} must be a valid number`);
      return { isValid: false, errors };
    }

    if (min !== undefined && num < min) {
      errors.push(`${fieldName} must be at least ${min}`);
    }

    if (max !== undefined && num > max) {
      errors.push(`${fieldName} must be at most ${max}`);
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }
}
