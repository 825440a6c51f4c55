import dotenv from 'dotenv';

import { runDeterminismCli } from '../lib/cli';

dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
    const result = await runDeterminismCli(process.argv.slice(2));
    console.log(result.output);
    process.exitCode = result.exitCode;
}

main().catch((err) => {
    console.error('[Determinism] Critical Unhandled Failure:', err);
    process.exit(1);
});
