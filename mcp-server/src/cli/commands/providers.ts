import { Command } from 'commander';
import { createAppContext } from '../../context.js';
import { listAvailableProviders } from '../../services/column-matching-service.js';
import { formatProviders } from '../format.js';

export const providersCommand = new Command('providers')
  .description('List available providers and their models')
  .option('--json', 'Print as JSON')
  .action((options: { json?: boolean }) => {
    const providers = listAvailableProviders(createAppContext().registry);
    if (options.json) {
      console.log(JSON.stringify(providers, null, 2));
      return;
    }
    for (const line of formatProviders(providers)) {
      console.log(line);
    }
  });
