import { ActivityType, Client, GatewayIntentBits, Events, REST, Routes, ChatInputCommandInteraction } from 'discord.js';
import { loadEnvironment, AppConfig } from './config.js';
import { buildCommands } from './commands.js';
import { createRunEmbed, createLedgerEmbed, createHelpEmbed } from './embeds.js';
import { PlaywrightBrowserProvider } from './browser.js';
import { createCompletionClient } from './completionClient.js';
import { createSupabaseClient } from './supabaseClient.js';
import { SupabaseGateway } from './persistence.js';
import { LedgerService } from './ledgerService.js';
import { PipelineService } from './pipelineService.js';
import { scheduleAtUtcHours, ScheduleHandle } from './scheduler.js';
import { PipelineError, describeError } from './errors.js';
import { formatUsd } from './decisionService.js';
import { readSnapshotRows } from './snapshotLog.js';
import {
  logDiscordInteraction,
  startPerformanceTimer,
  endPerformanceTimer,
  logAppState,
  log
} from './utils/logger.js';

logAppState('STARTUP', { message: 'Signal desk starting up...' });

function loadConfigOrExit(): AppConfig {
  try {
    return loadEnvironment();
  } catch (error) {
    logAppState('ERROR', { message: 'Invalid configuration', error: describeError(error) });
    process.exit(1);
  }
}

const config = loadConfigOrExit();

logAppState('CONFIG', {
  message: 'Configuration loaded',
  data: {
    chatProvider: config.chat.provider,
    chatModel: config.chat.model,
    trackedCoins: config.pipeline.trackedCoins,
    scheduleUtcHours: config.pipeline.scheduleUtcHours,
    decisionFallback: config.pipeline.decisionFallback
  }
});

const gateway = new SupabaseGateway(createSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey));
const ledger = new LedgerService({ gateway, policy: config.trading });
const pipeline = new PipelineService({
  browser: new PlaywrightBrowserProvider({
    headless: config.browser.headless,
    executablePath: config.browser.executablePath,
    actionTimeoutMs: config.browser.timeoutMs
  }),
  completion: createCompletionClient({
    provider: config.chat.provider,
    model: config.chat.model,
    apiKey: config.chat.apiKey,
    endpoint: config.chat.endpoint
  }),
  gateway,
  ledger,
  settings: {
    dataDir: config.pipeline.dataDir,
    browserTimeoutMs: config.browser.timeoutMs,
    chatTemperature: config.chat.temperature,
    chatTimeoutMs: config.chat.timeoutMs,
    newsMaxHeadlines: config.pipeline.newsMaxHeadlines,
    newsMaxWords: config.pipeline.newsMaxWords,
    baselineWindow: config.pipeline.baselineWindow,
    decisionFallback: config.pipeline.decisionFallback
  }
});

const commands = buildCommands(config.pipeline.trackedCoins);
const shutdown = new AbortController();
let schedule: ScheduleHandle | undefined;

const client = new Client({
  intents: [GatewayIntentBits.Guilds]
});

client.once(Events.ClientReady, (readyClient) => {
  logAppState('STARTUP', {
    message: `Discord bot is ready! Logged in as ${readyClient.user.tag}`,
    data: {
      username: readyClient.user.tag,
      serverCount: readyClient.guilds.cache.size,
      userId: readyClient.user.id
    }
  });

  registerSlashCommands().catch(error => {
    logAppState('ERROR', { message: 'Error registering slash commands', error });
  });

  logAppState('STARTUP', { message: 'Starting pipeline scheduler at configured UTC hours...' });
  schedule = scheduleAtUtcHours(config.pipeline.scheduleUtcHours, async () => {
    const results = await pipeline.runBatch(config.pipeline.trackedCoins, { signal: shutdown.signal });
    for (const result of results) {
      log(result.status === 'failure' ? 'WARN' : 'INFO', `Scheduled run for ${result.coin}: ${result.status}`,
        result.report?.summary ?? result.error?.message);
    }
  });

  client.user?.setActivity('crypto markets 📈', { type: ActivityType.Watching });
});

async function registerSlashCommands(): Promise<void> {
  const token = config.discord.token;
  const clientId = config.discord.clientId;
  if (!token || !clientId) {
    logAppState('ERROR', { message: 'DISCORD_BOT_TOKEN and DISCORD_CLIENT_ID are required to register commands' });
    return;
  }

  logAppState('STARTUP', { message: 'Started refreshing application (/) commands.' });
  const rest = new REST({ version: '10' }).setToken(token);
  const commandsData = commands.map(command => command.toJSON());
  const guildId = config.discord.guildId;

  if (guildId) {
    // Guild commands propagate immediately, global ones take up to an hour
    await rest.put(Routes.applicationGuildCommands(clientId, guildId), { body: commandsData });
    logAppState('STARTUP', {
      message: `Successfully registered ${commandsData.length} guild commands for server ${guildId}`,
      data: { commandCount: commandsData.length, guildId }
    });
  } else {
    await rest.put(Routes.applicationCommands(clientId), { body: commandsData });
    logAppState('STARTUP', {
      message: `Successfully registered ${commandsData.length} global commands`,
      data: { commandCount: commandsData.length }
    });
  }
}

function ledgerErrorMessage(error: unknown): string {
  if (error instanceof PipelineError && (error.code === 'INVALID_AMOUNT' || error.code === 'INSUFFICIENT_FUNDS')) {
    return `❌ **${error.message}**`;
  }
  return '❌ Sorry, the ledger could not be updated. Please try again.';
}

async function handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
  const userId = interaction.user.id;

  if (interaction.commandName === 'run') {
    const coin = interaction.options.getString('coin', true);
    await interaction.editReply(`🔄 **Running the pipeline for ${coin}...**\n*Scraping market data and news, this may take a minute*`);
    const result = await pipeline.runForCoin(coin, { signal: shutdown.signal });
    logDiscordInteraction('EDIT_REPLY', { commandName: interaction.commandName, message: `${coin}: ${result.status}` });
    await interaction.editReply({ content: '', embeds: [createRunEmbed(result)] });
    return;
  }

  if (interaction.commandName === 'deposit' || interaction.commandName === 'withdraw') {
    const coin = interaction.options.getString('coin', true);
    const amount = interaction.options.getNumber('amount', true);
    try {
      const capital = interaction.commandName === 'deposit'
        ? await ledger.deposit(userId, coin, amount)
        : await ledger.withdraw(userId, coin, amount);
      await interaction.editReply(`✅ **${interaction.commandName === 'deposit' ? 'Deposited' : 'Withdrew'} ${formatUsd(amount)}** for ${coin}. Capital: ${formatUsd(capital)}`);
    } catch (error) {
      log('WARN', `${interaction.commandName} rejected for ${userId}/${coin}`, describeError(error));
      await interaction.editReply(ledgerErrorMessage(error));
    }
    return;
  }

  if (interaction.commandName === 'ledger') {
    const coin = interaction.options.getString('coin', true);
    // value the pool at the last captured price, if any
    const lastSnapshot = (await readSnapshotRows(config.pipeline.dataDir, coin)).at(-1);
    const [own, summary] = await Promise.all([
      ledger.getLedger(userId, coin),
      ledger.summarizeCoin(coin, lastSnapshot?.price ?? null)
    ]);
    await interaction.editReply({ content: '', embeds: [createLedgerEmbed(coin, own, summary)] });
    return;
  }

  if (interaction.commandName === 'help') {
    await interaction.editReply({ content: '', embeds: [createHelpEmbed()] });
    return;
  }

  await interaction.editReply('❓ Unknown command. Use /help to see the available commands.');
}

client.on(Events.InteractionCreate, async (interaction) => {
  if (!interaction.isChatInputCommand()) return;

  logDiscordInteraction('COMMAND_RECEIVED', {
    commandName: interaction.commandName,
    userId: interaction.user.id,
    username: interaction.user.username
  });

  const timerId = startPerformanceTimer(`${interaction.commandName}-command`);
  try {
    // Acknowledge the interaction immediately to prevent timeout
    logDiscordInteraction('DEFER_REPLY', { commandName: interaction.commandName });
    await interaction.deferReply();
    await handleCommand(interaction);
  } catch (error) {
    logDiscordInteraction('ERROR', { commandName: interaction.commandName, error });
    if (interaction.deferred) {
      await interaction.editReply('❌ Sorry, I encountered an error processing your request. Please try again.')
        .catch(replyError => log('ERROR', 'Failed to send error reply', describeError(replyError)));
    }
  } finally {
    endPerformanceTimer(timerId);
  }
});

client.on(Events.Error, (error) => {
  logAppState('ERROR', { message: 'Discord client error', error });
});

process.on('unhandledRejection', (error) => {
  logAppState('ERROR', { message: 'Unhandled promise rejection', error });
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logAppState('SHUTDOWN', { message: `Received ${signal}, cancelling runs and logging out` });
    schedule?.stop();
    shutdown.abort();
    void client.destroy().finally(() => process.exit(0));
  });
}

const token = config.discord.token;
if (!token) {
  logAppState('ERROR', { message: 'DISCORD_BOT_TOKEN is not set in .env file' });
  process.exit(1);
}

client.login(token).catch((error) => {
  logAppState('ERROR', { message: 'Failed to login to Discord', error });
  process.exit(1);
});
