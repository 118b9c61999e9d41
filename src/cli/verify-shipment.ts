/**
 * @file    verify-shipment.ts
 * @purpose Runs the full verification workflow on local files and prints the
 *          comparison table. Same pipeline and caches as /api/process-complete.
 * @deps    dotenv
 * @env     GOOGLE_GENERATIVE_AI_API_KEY | OPENAI_API_KEY | ANTHROPIC_API_KEY,
 *          NEXT_PUBLIC_SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY (optional)
 *
 * Usage:
 *   npx tsx src/cli/verify-shipment.ts --bl bl.pdf --invoice inv.pdf [--packing pl.xlsx] [--force | --reverify]
 */

import * as dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

import { errorMessage } from '../lib/errors';
import { getVerificationService } from '../lib/verification/service';

function readOption(args: string[], name: string): string | undefined {
    const i = args.indexOf(`--${name}`);
    if (i === -1) return undefined;
    const value = args[i + 1];
    return value && !value.startsWith('--') ? value : undefined;
}

async function run() {
    const args = process.argv.slice(2);
    const bl = readOption(args, 'bl');
    const invoice = readOption(args, 'invoice');
    const packing = readOption(args, 'packing');
    const force = args.includes('--force');
    const reverify = args.includes('--reverify');

    if (!bl || !invoice) {
        console.error('Usage: verify-shipment --bl <file> --invoice <file> [--packing <file>] [--force | --reverify]');
        process.exit(1);
    }

    const { verifier, aiEnabled } = getVerificationService();
    if (!aiEnabled) {
        console.error('❌ No extraction provider configured. Set GOOGLE_GENERATIVE_AI_API_KEY, OPENAI_API_KEY or ANTHROPIC_API_KEY.');
        process.exit(1);
    }

    const files = { bl, invoice, packing };
    const result = reverify
        ? await verifier.reverify(files)
        : await verifier.processWorkflow(files, { force });

    const { report } = result;
    console.log(`\n📋 Workflow ${result.workflowKey.slice(0, 12)}${result.cached ? ' (cached)' : ''}\n`);
    for (const check of report.comparison.details) {
        const icon = check.status === 'match' ? '✅' : '❌';
        const values = Object.entries(check.values).map(([role, v]) => `${role}=${v}`).join('  ');
        console.log(`   ${icon} ${check.field.padEnd(20)} ${values}`);
    }

    if (report.cnpjValidation) {
        const { cnpj, source, valid, registry } = report.cnpjValidation;
        console.log(`\n   CNPJ ${cnpj} (${source}): ${valid ? '✅ valid' : '❌ invalid'}`);
        if (registry?.legalName) console.log(`   Registry: ${registry.legalName} [${registry.status ?? 'unknown status'}]`);
    }

    console.log(`\n📊 ${report.summary.passed}/${report.summary.totalChecks} passed, success rate ${report.summary.successRate}`);
    if (result.reportFile) console.log(`   Report saved: ${result.reportFile}`);
    process.exit(0);
}

run().catch(err => {
    console.error(`\n❌ Verification failed: ${errorMessage(err)}`);
    process.exit(1);
});
