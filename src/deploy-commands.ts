import * as dotenv from 'dotenv';
import { loadBotConfig } from './config/bot.config';
import { loadCommands } from './commands/registry';
import { CommandDeployer } from './services/command-deployer.service';
import { ConfigError, ErrorHandler } from './utils/error-handler.util';
import { Logger } from './utils/logger';

// Load environment variables
dotenv.config();

const logger = new Logger();

const USAGE = [
  'Usage: npm run deploy -- <deploy|clear>',
  '  deploy - Deploy commands (to DISCORD_GUILD_ID when set, globally otherwise)',
  '  clear  - Remove the deployed commands from the same scope',
];

async function main(action: string | undefined): Promise<void> {
  const config = loadBotConfig();
  if (!config.clientId) {
    throw new ConfigError('DISCORD_CLIENT_ID is required to deploy commands');
  }

  const deployer = new CommandDeployer(config.discordToken, config.clientId, { logger });

  switch (action ?? 'deploy') {
    case 'deploy':
      await deployer.deploy(loadCommands(), config.devGuildId);
      break;
    case 'clear':
      await deployer.clear(config.devGuildId);
      break;
    default:
      USAGE.forEach(line => logger.info(line));
      break;
  }
}

/**
 * Standalone script to deploy commands
 */
if (require.main === module) {
  main(process.argv[2]).catch(error => {
    logger.error('Command deployment failed', { error: ErrorHandler.toError(error) });
    process.exit(1);
  });
}
