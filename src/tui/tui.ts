import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import type { RestaurantSearchService } from '../services/tabelog/search.service.js';
import { TuiSession } from './session.js';

/**
 * Interactive search on the terminal. Ends on `q` or end of input.
 */
export async function runTui(service: RestaurantSearchService): Promise<void> {
  const session = new TuiSession(service);
  const rl = readline.createInterface({ input, output });

  output.write('gurume: interactive restaurant search (q to quit)\n');
  rl.setPrompt(session.prompt);
  rl.prompt();

  try {
    for await (const line of rl) {
      const step = await session.handle(line);
      for (const text of step.output) output.write(`${text}\n`);
      if (step.done) break;
      rl.setPrompt(step.prompt);
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
