/**
 * @file    check-cnpj.ts
 * @purpose Checks a CNPJ's digits and, with --online, looks it up in the registry.
 *
 * Usage:
 *   npx tsx src/cli/check-cnpj.ts 11.222.333/0001-81 [--online]
 */

import * as dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

import { cleanCnpj, formatCnpj, validateCnpj } from '../lib/compliance/cnpj';
import { ReceitaWsRegistry } from '../lib/compliance/cnpj-registry';
import { errorMessage } from '../lib/errors';

async function run() {
    const args = process.argv.slice(2);
    const input = args.find(a => !a.startsWith('--'));
    if (!input) {
        console.error('Usage: check-cnpj <cnpj> [--online]');
        process.exit(1);
    }

    const digits = cleanCnpj(input);
    const valid = validateCnpj(digits);
    console.log(`\n🔎 ${formatCnpj(digits)}: ${valid ? '✅ check digits OK' : '❌ invalid'}`);

    if (valid && args.includes('--online')) {
        const result = await new ReceitaWsRegistry().lookup(digits);
        if (!result.valid) {
            console.log(`   ⚠️ ${result.error ?? 'Registry lookup failed'}`);
        } else {
            console.log(`   ${result.legalName ?? '(no legal name)'}${result.tradeName ? ` / ${result.tradeName}` : ''}`);
            console.log(`   Status: ${result.status ?? 'unknown'}`);
            console.log(`   ${[result.address, result.city, result.state, result.postalCode].filter(Boolean).join(', ')}`);
        }
    }
    process.exit(valid ? 0 : 2);
}

run().catch(err => {
    console.error(`❌ ${errorMessage(err)}`);
    process.exit(1);
});
