import { SlashCommandBuilder, SlashCommandStringOption } from 'discord.js';

// Discord allows at most 25 choices per option
const MAX_CHOICES = 25;

function coinOption(trackedCoins: string[]) {
  return (option: SlashCommandStringOption) => option
    .setName('coin')
    .setDescription('Coin slug (e.g., bitcoin, ethereum)')
    .setRequired(true)
    .addChoices(...trackedCoins.slice(0, MAX_CHOICES).map(coin => ({ name: coin, value: coin })));
}

export function buildCommands(trackedCoins: string[]) {
  return [
    new SlashCommandBuilder()
      .setName('run')
      .setDescription('Capture market data, ask the model and apply the decision for one coin')
      .addStringOption(coinOption(trackedCoins)),

    new SlashCommandBuilder()
      .setName('deposit')
      .setDescription('Add simulated capital to your ledger for a coin')
      .addStringOption(coinOption(trackedCoins))
      .addNumberOption(option =>
        option.setName('amount')
          .setDescription('Amount in USD')
          .setRequired(true)
      ),

    new SlashCommandBuilder()
      .setName('withdraw')
      .setDescription('Withdraw simulated capital from your ledger for a coin')
      .addStringOption(coinOption(trackedCoins))
      .addNumberOption(option =>
        option.setName('amount')
          .setDescription('Amount in USD')
          .setRequired(true)
      ),

    new SlashCommandBuilder()
      .setName('ledger')
      .setDescription('Show your ledger and the pool totals for a coin')
      .addStringOption(coinOption(trackedCoins)),

    new SlashCommandBuilder()
      .setName('help')
      .setDescription('Show available commands and how to use them')
  ];
}
