import { EmbedBuilder } from 'discord.js';
import { GlobalLedger, PipelineResult, UserLedger } from './types.js';
import { netInvestment } from './ledgerService.js';
import { describeTrade, formatUsd, sentimentLabel } from './decisionService.js';
import { formatMaybe } from './utils/normalizer.js';

export const NO_DATA_MESSAGE = 'No data available for this run';

const FOOTER = { text: 'Signal Desk • Simulated trading, no real orders' };

function decisionColor(decision: string): number {
  return decision === 'BUY' ? 0x00ff00 : decision === 'SELL' ? 0xff0000 : 0xffff00;
}

function decisionEmoji(decision: string): string {
  return decision === 'BUY' ? '🟢' : decision === 'SELL' ? '🔴' : '🟡';
}

// Discord rejects field values over 1024 characters
function clip(text: string, max = 1024): string {
  return text.length > max ? `${text.substring(0, max - 3)}...` : text;
}

export function createRunEmbed(result: PipelineResult): EmbedBuilder {
  const report = result.report;

  if (!report) {
    const reason = result.error ? `${result.error.stage}: ${result.error.message}` : 'unknown error';
    return new EmbedBuilder()
      .setColor(0xff0000)
      .setTitle(`❌ ${result.coin.toUpperCase()}`)
      .setDescription(NO_DATA_MESSAGE)
      .addFields({ name: 'Reason', value: clip(reason), inline: false })
      .setTimestamp()
      .setFooter(FOOTER);
  }

  const { snapshot, digest } = report;
  const embed = new EmbedBuilder()
    .setColor(decisionColor(report.decision))
    .setTitle(`${decisionEmoji(report.decision)} ${report.coin.toUpperCase()}: ${report.decision}`)
    .setDescription(report.summary)
    .addFields(
      { name: '💰 Price', value: formatUsd(snapshot.price), inline: true },
      { name: '📊 24h Change', value: formatMaybe(snapshot.priceChange24hPercent, value => `${value > 0 ? '+' : ''}${value.toFixed(2)}%`), inline: true },
      { name: '🔮 Predicted Close', value: formatMaybe(report.predictedClose, formatUsd), inline: true },
      {
        name: '📰 News Sentiment',
        value: report.newsAvailable
          ? `${formatMaybe(digest.sentiment, value => value.toFixed(2))} (${sentimentLabel(digest.sentiment)})`
          : 'N/A (news unavailable)',
        inline: true
      },
      { name: '🤖 Source', value: report.decisionSource === 'model' ? 'Model' : 'Fallback (HOLD)', inline: true }
    )
    .setTimestamp(new Date(report.createdAt))
    .setFooter(FOOTER);

  if (report.trades.length > 0) {
    embed.addFields({ name: '📒 Trades', value: clip(report.trades.map(describeTrade).join('\n')), inline: false });
  }

  if (result.stageErrors.length > 0) {
    embed.addFields({
      name: '⚠️ Degraded',
      value: clip(result.stageErrors.map(error => `${error.stage}${error.userId ? ` (${error.userId})` : ''}: ${error.message}`).join('\n')),
      inline: false
    });
  }

  return embed;
}

export function createLedgerEmbed(coin: string, ledger: UserLedger | null, summary: GlobalLedger): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(0x3b82f6)
    .setTitle(`📒 ${coin.toUpperCase()} Ledger`)
    .setTimestamp()
    .setFooter(FOOTER);

  if (ledger === null) {
    embed.setDescription('You have no ledger for this coin yet. Use /deposit to fund one.');
  } else {
    const share = summary.users.find(user => user.userId === ledger.userId);
    embed.addFields(
      { name: '🏦 Capital', value: formatUsd(ledger.currentCapital), inline: true },
      { name: '📦 Position', value: ledger.positionQuantity.toFixed(8), inline: true },
      { name: '💵 Net Investment', value: formatUsd(netInvestment(ledger)), inline: true },
      { name: '✅ Realized Gains', value: formatUsd(ledger.realizedGains), inline: true },
      { name: '📈 Unrealized Gains', value: formatMaybe(share?.unrealizedGains ?? null, formatUsd), inline: true },
      { name: '🥧 Pool Share', value: `${(share?.ownershipPct ?? 0).toFixed(2)}%`, inline: true }
    );
  }

  embed.addFields({
    name: '🌐 Pool',
    value: [
      `Users: ${summary.userCount}`,
      `Net investment: ${formatUsd(summary.netInvestment)}`,
      `Portfolio value: ${formatMaybe(summary.portfolioValue, formatUsd)}`,
      `Performance: ${formatMaybe(summary.performancePct, value => `${value.toFixed(2)}%`)}`
    ].join('\n'),
    inline: false
  });

  return embed;
}

export function createHelpEmbed(): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(0x3b82f6)
    .setTitle('🤖 Signal Desk Commands')
    .setDescription('Simulated trading on scraped market data and community news')
    .addFields(
      { name: '/run [coin]', value: 'Run the capture and decision pipeline for a coin now', inline: false },
      { name: '/deposit [coin] [amount]', value: 'Add simulated capital', inline: false },
      { name: '/withdraw [coin] [amount]', value: 'Withdraw simulated capital', inline: false },
      { name: '/ledger [coin]', value: 'Show your ledger and the pool totals', inline: false },
      { name: '/help', value: 'Show this help message', inline: false }
    )
    .setTimestamp()
    .setFooter(FOOTER);
}
