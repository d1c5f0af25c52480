// Console logging for the signal desk: timestamped, emoji-tagged lines

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface ApiCallDetails {
  endpoint: string;
  method: string;
  headers?: Record<string, string>;
  body?: unknown;
  context?: string;
}

export interface ApiResponseDetails {
  status: number;
  statusText?: string;
  data?: unknown;
  error?: unknown;
  context?: string;
}

export interface DatabaseOperation {
  operation: 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE' | 'UPSERT';
  table: string;
  params?: unknown;
  resultCount?: number;
  affectedRows?: number;
}

export interface PerformanceMetric {
  operation: string;
  startTime: number;
  endTime?: number;
  duration?: number;
}

// Format timestamp as DD:MM:YY HH:MM:SS
export function formatTimestamp(now: Date = new Date()): string {
  const day = String(now.getDate()).padStart(2, '0');
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const year = String(now.getFullYear()).slice(-2);
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');

  return `${day}:${month}:${year} ${hours}:${minutes}:${seconds}`;
}

function preview(value: unknown, max: number): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
  return text.length > max ? `${text.substring(0, max)}...` : text;
}

// Log an outgoing request to the language model or another HTTP API
export function logApiRequest(details: ApiCallDetails): void {
  const timestamp = formatTimestamp();
  console.log(`[${timestamp}] 🌐 API REQUEST${details.context ? ` (${details.context})` : ''}`);
  console.log(`  📍 Endpoint: ${details.endpoint}`);
  console.log(`  🔧 Method: ${details.method}`);

  if (details.headers && Object.keys(details.headers).length > 0) {
    console.log(`  📋 Headers:`, sanitizeHeaders(details.headers));
  }

  if (details.body !== undefined) {
    console.log(`  📦 Body: ${preview(details.body, 500)}`);
  }
}

export function logApiResponse(endpoint: string, details: ApiResponseDetails): void {
  const timestamp = formatTimestamp();
  const statusEmoji = details.status >= 200 && details.status < 300 ? '✅' :
                     details.status >= 400 && details.status < 500 ? '⚠️' : '❌';

  console.log(`[${timestamp}] ${statusEmoji} API RESPONSE${details.context ? ` (${details.context})` : ''}`);
  console.log(`  📍 Endpoint: ${endpoint}`);
  console.log(`  📊 Status: ${details.status} ${details.statusText || ''}`);

  if (details.data !== undefined) {
    console.log(`  📦 Response Data: ${preview(details.data, 500)}`);
  }

  if (details.error !== undefined) {
    console.log(`  ❌ Error:`, details.error);
  }
}

export function logDatabaseOperation(details: DatabaseOperation): void {
  const timestamp = formatTimestamp();
  console.log(`[${timestamp}] 🗄️ DATABASE OPERATION`);
  console.log(`  🔧 Operation: ${details.operation}`);
  console.log(`  📋 Table: ${details.table}`);

  if (details.params !== undefined) {
    console.log(`  🔍 Params: ${preview(details.params, 300)}`);
  }

  if (details.resultCount !== undefined) {
    console.log(`  📊 Results: ${details.resultCount} records`);
  }

  if (details.affectedRows !== undefined) {
    console.log(`  📊 Affected: ${details.affectedRows} rows`);
  }
}

export function logDatabaseError(operation: string, table: string, error: unknown): void {
  const timestamp = formatTimestamp();
  console.log(`[${timestamp}] ❌ DATABASE ERROR`);
  console.log(`  🔧 Operation: ${operation}`);
  console.log(`  📋 Table: ${table}`);
  console.log(`  ❌ Error:`, error);
}

// Browser automation steps (navigation, clicks, downloads)
export function logBrowserAction(action: 'NAVIGATE' | 'WAIT' | 'CLICK' | 'DOWNLOAD' | 'CLOSE' | 'ERROR', details: {
  url?: string;
  selector?: string;
  message?: string;
  error?: unknown;
}): void {
  const timestamp = formatTimestamp();
  const emoji = action === 'NAVIGATE' ? '🧭' :
                action === 'WAIT' ? '⏳' :
                action === 'CLICK' ? '🖱️' :
                action === 'DOWNLOAD' ? '📥' :
                action === 'CLOSE' ? '🚪' : '❌';

  console.log(`[${timestamp}] ${emoji} BROWSER ${action}`);

  if (details.url) {
    console.log(`  🔗 URL: ${details.url}`);
  }

  if (details.selector) {
    console.log(`  🎯 Selector: ${details.selector}`);
  }

  if (details.message) {
    console.log(`  💭 ${details.message}`);
  }

  if (details.error !== undefined) {
    console.log(`  ❌ Error:`, details.error);
  }
}

export function logLedgerOperation(operation: 'DEPOSIT' | 'WITHDRAW' | 'BUY' | 'SELL' | 'HOLD' | 'SKIP' | 'REJECTED', details: {
  userId: string;
  coin: string;
  amount?: number;
  capitalAfter?: number;
  positionAfter?: number;
  message?: string;
}): void {
  const timestamp = formatTimestamp();
  const emoji = operation === 'DEPOSIT' ? '💰' :
                operation === 'WITHDRAW' ? '🏧' :
                operation === 'BUY' ? '🟢' :
                operation === 'SELL' ? '🔴' :
                operation === 'HOLD' ? '🟡' :
                operation === 'SKIP' ? '⏭️' : '⛔';

  console.log(`[${timestamp}] ${emoji} LEDGER ${operation}: ${details.userId} / ${details.coin}`);

  if (details.amount !== undefined) {
    console.log(`  💵 Amount: ${details.amount}`);
  }

  if (details.capitalAfter !== undefined) {
    console.log(`  🏦 Capital: $${details.capitalAfter.toFixed(2)}`);
  }

  if (details.positionAfter !== undefined) {
    console.log(`  📦 Position: ${details.positionAfter}`);
  }

  if (details.message) {
    console.log(`  💭 ${details.message}`);
  }
}

export function logDiscordInteraction(type: 'COMMAND_RECEIVED' | 'DEFER_REPLY' | 'EDIT_REPLY' | 'FOLLOW_UP' | 'ERROR', details: {
  commandName?: string;
  userId?: string;
  username?: string;
  message?: string;
  error?: unknown;
}): void {
  const timestamp = formatTimestamp();
  const emoji = type === 'COMMAND_RECEIVED' ? '🎯' :
                type === 'DEFER_REPLY' ? '⏳' :
                type === 'EDIT_REPLY' ? '✏️' :
                type === 'FOLLOW_UP' ? '📤' : '❌';

  console.log(`[${timestamp}] ${emoji} DISCORD ${type.replace('_', ' ')}`);

  if (details.commandName) {
    console.log(`  🎮 Command: /${details.commandName}`);
  }

  if (details.userId && details.username) {
    console.log(`  👤 User: ${details.username} (${details.userId})`);
  }

  if (details.message) {
    console.log(`  💭 Message: ${preview(details.message, 200)}`);
  }

  if (details.error !== undefined) {
    console.log(`  ❌ Error:`, details.error);
  }
}

// Performance tracking
const performanceMetrics = new Map<string, PerformanceMetric>();

export function startPerformanceTimer(operation: string): string {
  const id = `${operation}_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  performanceMetrics.set(id, {
    operation,
    startTime: Date.now()
  });

  console.log(`[${formatTimestamp()}] ⏱️ PERFORMANCE START: ${operation}`);

  return id;
}

export function endPerformanceTimer(id: string): void {
  const metric = performanceMetrics.get(id);
  if (!metric) {
    console.log(`[${formatTimestamp()}] ⚠️ PERFORMANCE: Timer ${id} not found`);
    return;
  }

  metric.endTime = Date.now();
  metric.duration = metric.endTime - metric.startTime;

  const durationStr = metric.duration < 1000 ? `${metric.duration}ms` : `${(metric.duration / 1000).toFixed(2)}s`;
  console.log(`[${formatTimestamp()}] ⏱️ PERFORMANCE END: ${metric.operation} - Duration: ${durationStr}`);

  performanceMetrics.delete(id);
}

export function logAppState(type: 'STARTUP' | 'SHUTDOWN' | 'CONFIG' | 'ERROR', details: {
  message: string;
  data?: unknown;
  error?: unknown;
}): void {
  const emoji = type === 'STARTUP' ? '🚀' :
                type === 'SHUTDOWN' ? '🛑' :
                type === 'CONFIG' ? '⚙️' : '❌';

  console.log(`[${formatTimestamp()}] ${emoji} APP ${type}: ${details.message}`);

  if (details.data !== undefined) {
    console.log(`  📊 Data:`, details.data);
  }

  if (details.error !== undefined) {
    console.log(`  ❌ Error:`, details.error);
  }
}

export function logFunctionEntry(functionName: string, params?: unknown): void {
  console.log(`[${formatTimestamp()}] 🔵 ENTER: ${functionName}`);

  if (params !== undefined) {
    console.log(`  🔍 Params:`, params);
  }
}

export function logFunctionExit(functionName: string, result?: unknown): void {
  console.log(`[${formatTimestamp()}] 🔴 EXIT: ${functionName}`);

  if (result !== undefined) {
    console.log(`  📤 Result: ${preview(result, 200)}`);
  }
}

// Remove credentials before headers reach the console
export function sanitizeHeaders(headers: Record<string, string>): Record<string, string> {
  const sanitized = { ...headers };
  const sensitiveKeys = ['authorization', 'x-api-key', 'x-goog-api-key', 'apikey', 'cookie', 'set-cookie'];

  for (const key of Object.keys(sanitized)) {
    if (sensitiveKeys.includes(key.toLowerCase())) {
      sanitized[key] = '[REDACTED]';
    }
  }

  return sanitized;
}

export function log(level: LogLevel, message: string, data?: unknown): void {
  const emoji = level === 'INFO' ? 'ℹ️' : level === 'WARN' ? '⚠️' : '❌';

  console.log(`[${formatTimestamp()}] ${emoji} ${level}: ${message}`);

  if (data !== undefined) {
    console.log(`  📊 Data:`, data);
  }
}
