import dotenv from 'dotenv';

import { runPlannerCli } from '../lib/cli';

dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
    const result = await runPlannerCli(process.argv.slice(2));
    console.log(result.output);
    process.exitCode = result.exitCode;
}

main().catch((err) => {
    console.error('[Plan] Critical Unhandled Failure:', err);
    process.exit(1);
});
