/**
 * Personal document (CPF) handling
 *
 * Documents are stored as bare digit strings. Users may type them masked
 * ("529.982.247-25"), so every entry point normalizes first.
 */

export interface DocumentValidator {
  isValid(document: string): boolean;
}

/**
 * Strip mask characters, keeping only digits
 */
export function normalizeDocument(document: string): string {
  return document.replace(/\D/g, '');
}

// CPF validation with Módulo 11
function isValidCPF(cpf: string): boolean {
  if (!/^\d{11}$/.test(cpf)) return false;
  if (/^(\d)\1{10}$/.test(cpf)) return false; // All same digits

  const digits = cpf.split('').map(Number);

  return checkDigit(digits, 9) === digits[9] && checkDigit(digits, 10) === digits[10];
}

/**
 * Check digit over the first `length` digits, weights descending from length + 1
 */
function checkDigit(digits: number[], length: number): number {
  let sum = 0;
  for (let i = 0; i < length; i++) {
    sum += (digits[i] ?? 0) * (length + 1 - i);
  }
  const remainder = (sum * 10) % 11;
  return remainder === 10 ? 0 : remainder;
}

export const cpfValidator: DocumentValidator = {
  isValid: isValidCPF,
};
