/**
 * @file    cnpj.ts
 * @purpose CNPJ (Brazilian legal-entity tax ID) cleanup, formatting and
 *          check-digit validation. Pure functions; malformed input yields
 *          `false` or the input unchanged, never an exception.
 */

const FIRST_DIGIT_WEIGHTS = [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];
const SECOND_DIGIT_WEIGHTS = [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];

export function cleanCnpj(cnpj: string): string {
    return cnpj.replace(/\D/g, "");
}

function checkDigit(digits: string, weights: number[]): number {
    let total = 0;
    for (let i = 0; i < weights.length; i++) {
        total += Number(digits[i]) * weights[i];
    }
    const remainder = total % 11;
    return remainder < 2 ? 0 : 11 - remainder;
}

export function validateCnpj(cnpj: string): boolean {
    const digits = cleanCnpj(cnpj);
    if (digits.length !== 14) return false;
    if (digits === digits[0].repeat(14)) return false;

    const first = checkDigit(digits.slice(0, 12), FIRST_DIGIT_WEIGHTS);
    const second = checkDigit(`${digits.slice(0, 12)}${first}`, SECOND_DIGIT_WEIGHTS);
    return digits.slice(12) === `${first}${second}`;
}

/** "11222333000181" → "11.222.333/0001-81"; anything that isn't 14 digits comes back as-is. */
export function formatCnpj(cnpj: string): string {
    const digits = cleanCnpj(cnpj);
    if (digits.length !== 14) return cnpj;
    return `${digits.slice(0, 2)}.${digits.slice(2, 5)}.${digits.slice(5, 8)}/${digits.slice(8, 12)}-${digits.slice(12)}`;
}
