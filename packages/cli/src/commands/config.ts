import { Command } from 'commander';
import { ConfigManager, CONFIG_FILE_NAMES, CONFIG_ENV_VARS } from '@budgetline/core';

export function createConfigCommand(): Command {
  const configCommand = new Command('config')
    .description('Manage budgetline configuration');

  configCommand
    .command('show')
    .description('Show current configuration')
    .option('-c, --config <path>', 'Config file path')
    .action(async (options: { config?: string }) => {
      const mgr = new ConfigManager();
      const config = await mgr.load({ configPath: options.config });
      console.log(JSON.stringify(config, null, 2));
    });

  configCommand
    .command('path')
    .description('Show config file search paths')
    .action(() => {
      console.log('Config files searched (first found wins, up to 10 parent directories):');
      CONFIG_FILE_NAMES.forEach((name, i) => console.log(`  ${i + 1}. ./${name}`));
      console.log('');
      console.log('Environment variables:');
      for (const name of CONFIG_ENV_VARS) {
        console.log(`  ${name}`);
      }
    });

  return configCommand;
}
