import { Result } from '../models/structures';
import { err, ok } from '../services/common';
import { onlyDigits } from './text';

const allSame = (digits: string) => /^(\d)\1*$/.test(digits);

export function isValidCpf(value: string): boolean {
  const digits = onlyDigits(value);
  if (digits.length !== 11 || allSame(digits)) return false;

  const checkDigit = (length: number) => {
    let sum = 0;
    for (let i = 0; i < length; i++) {
      sum += Number(digits[i]) * (length + 1 - i);
    }
    const rest = (sum * 10) % 11;
    return rest === 10 ? 0 : rest;
  };

  return checkDigit(9) === Number(digits[9]) && checkDigit(10) === Number(digits[10]);
}

const CNPJ_WEIGHTS_1 = [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];
const CNPJ_WEIGHTS_2 = [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];

export function isValidCnpj(value: string): boolean {
  const digits = onlyDigits(value);
  if (digits.length !== 14 || allSame(digits)) return false;

  const checkDigit = (weights: number[]) => {
    const sum = weights.reduce((acc, weight, i) => acc + Number(digits[i]) * weight, 0);
    const rest = sum % 11;
    return rest < 2 ? 0 : 11 - rest;
  };

  return (
    checkDigit(CNPJ_WEIGHTS_1) === Number(digits[12]) &&
    checkDigit(CNPJ_WEIGHTS_2) === Number(digits[13])
  );
}

/** CPF or CNPJ, returned as digits only. Empty input stays empty. */
export function validateCnpjCpf(value: string | null | undefined): Result<string> {
  const digits = onlyDigits(value);
  if (!digits) return ok('');
  if (digits.length === 11) {
    return isValidCpf(digits) ? ok(digits) : err('VALIDATION_ERROR', 'CPF inválido.');
  }
  if (digits.length === 14) {
    return isValidCnpj(digits) ? ok(digits) : err('VALIDATION_ERROR', 'CNPJ inválido.');
  }
  return err('VALIDATION_ERROR', 'Informe CPF (11 dígitos) ou CNPJ (14 dígitos).');
}

// "01310100" -> "01310-100"
export function normalizeCep(value: string | null | undefined, required = false): Result<string> {
  const digits = onlyDigits(value);
  if (!digits) {
    return required ? err('VALIDATION_ERROR', 'Informe o CEP.') : ok('');
  }
  if (digits.length !== 8) return err('VALIDATION_ERROR', 'CEP deve ter 8 dígitos.');
  return ok(`${digits.slice(0, 5)}-${digits.slice(5)}`);
}

// "20102011" -> "2010/2011"
export function normalizeVehicleYear(value: string | null | undefined): Result<string> {
  const raw = (value ?? '').trim();
  if (!raw) return ok('');
  const digits = onlyDigits(raw);
  if (digits.length === 4) return ok(digits);
  if (digits.length === 8) return ok(`${digits.slice(0, 4)}/${digits.slice(4)}`);
  return err('VALIDATION_ERROR', 'Informe o ano/modelo no formato 0000/0000.');
}
