import { createInterface } from 'readline/promises';
import { HELP_TEXT, runCommand } from '@/app/shell';
import { SETUP_STEPS } from '@/config/constants';
import { load, loadLogLevelSetting } from '@/config/loadConfig';
import { ConfigError } from '@/library/errors';
import { RootStore } from '@/stores/RootStore';
import { resolveLogLevel, setLogLevel } from '@/utils/logger';

function printSetup(error: ConfigError) {
  console.error(error.message);
  console.error('Steps:');
  SETUP_STEPS.forEach((step, index) => console.error(`${index + 1}) ${step}`));
}

async function main() {
  setLogLevel(resolveLogLevel(loadLogLevelSetting()));

  let store: RootStore;
  try {
    store = new RootStore(load());
  } catch (error) {
    if (error instanceof ConfigError) {
      printSetup(error);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  console.log('Life organizer. Type "help" for commands, "quit" to exit.');
  console.log(HELP_TEXT);

  try {
    for await (const line of rl) {
      if (line.trim() === 'quit') break;

      const reply = await runCommand(store, line);
      if (reply.message) {
        (reply.ok ? console.log : console.error)(reply.message);
      }
    }
  } finally {
    rl.close();
    if (store.isAuthenticated) {
      await store.logout();
    }
    store.dispose();
  }
}

main().catch(error => {
  console.error('Fatal error:', error);
  process.exitCode = 1;
});
