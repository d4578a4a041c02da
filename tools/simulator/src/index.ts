import { Components } from '@quorum/shared-types';
import { flushLogs, log } from '@quorum/logger';
import { loadEnv } from '@quorum/ballot-server';
import { DEFAULT_SCENARIO, runScenario } from './scenario';

async function main(): Promise<void> {
  const env = loadEnv();
  log('info', Components.SIMULATOR, 'simulator.start', { authority: env.BALLOT_AUTHORITY });

  const result = await runScenario({
    ...DEFAULT_SCENARIO,
    authority: env.BALLOT_AUTHORITY,
    secret: env.AUTH_SECRET,
  });
  console.log(`Winner: #${result.winner} "${result.winningText}"`);
}

main()
  .catch((err: unknown) => {
    log('error', Components.SIMULATOR, 'simulator.failed', {
      error: err instanceof Error ? err.message : String(err),
    });
    process.exitCode = 1;
  })
  .finally(flushLogs);
