import axios from 'axios';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { CompletionError, CompletionTimeout, describeError } from './errors.js';
import { logApiRequest, logApiResponse, log } from './utils/logger.js';

export interface CompletionOptions {
  temperature: number;
  timeoutMs: number;
}

/** A stateless text completion: one prompt in, the raw model text out. */
export interface CompletionClient {
  readonly name: string;
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export class GeminiCompletionClient implements CompletionClient {
  readonly name = 'gemini';
  private readonly genAI: GoogleGenerativeAI;

  constructor(apiKey: string, private readonly model: string) {
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const model = this.genAI.getGenerativeModel({
      model: this.model,
      generationConfig: { temperature: options.temperature }
    });

    logApiRequest({
      endpoint: 'Gemini AI API',
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': '[REDACTED]'
      },
      body: { model: this.model, promptLength: prompt.length, temperature: options.temperature },
      context: 'decision'
    });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const result = await model.generateContent(prompt, { signal: controller.signal });
      const text = result.response.text();

      logApiResponse('Gemini AI API', { status: 200, statusText: 'OK', data: { responseLength: text.length }, context: 'decision' });
      return text;
    } catch (error) {
      logApiResponse('Gemini AI API', { status: 500, statusText: 'Error', error: describeError(error), context: 'decision' });
      if (controller.signal.aborted) {
        throw new CompletionTimeout(options.timeoutMs, { cause: error });
      }
      throw new CompletionError(`Gemini completion failed: ${describeError(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}

interface OllamaGenerateResponse {
  response?: unknown;
}

/** Any server speaking Ollama's `/api/generate` protocol. */
export class OllamaCompletionClient implements CompletionClient {
  readonly name = 'ollama';

  constructor(private readonly endpoint: string, private readonly model: string) {}

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const url = `${this.endpoint.replace(/\/+$/, '')}/api/generate`;

    logApiRequest({
      endpoint: url,
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: { model: this.model, promptLength: prompt.length, temperature: options.temperature },
      context: 'decision'
    });

    try {
      const response = await axios.post<OllamaGenerateResponse>(url, {
        model: this.model,
        prompt,
        stream: false,
        options: { temperature: options.temperature }
      }, {
        timeout: options.timeoutMs,
        headers: { 'Content-Type': 'application/json' }
      });

      logApiResponse(url, {
        status: response.status,
        statusText: response.statusText,
        data: response.data,
        context: 'decision'
      });

      const text = response.data.response;
      if (typeof text !== 'string') {
        throw new CompletionError('Completion response carried no text');
      }
      return text;
    } catch (error) {
      if (error instanceof CompletionError) {
        throw error;
      }
      if (axios.isAxiosError(error)) {
        logApiResponse(url, {
          status: error.response?.status ?? 0,
          statusText: error.response?.statusText,
          error: error.message,
          context: 'decision'
        });
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new CompletionTimeout(options.timeoutMs, { cause: error });
        }
      }
      throw new CompletionError(`Completion request to ${url} failed: ${describeError(error)}`, { cause: error });
    }
  }
}

export function createCompletionClient(settings: {
  provider: 'gemini' | 'ollama';
  model: string;
  apiKey?: string;
  endpoint?: string;
}): CompletionClient {
  if (settings.provider === 'gemini') {
    log('INFO', `Using Gemini model ${settings.model} for decisions`);
    return new GeminiCompletionClient(settings.apiKey ?? '', settings.model);
  }
  log('INFO', `Using ${settings.endpoint} (${settings.model}) for decisions`);
  return new OllamaCompletionClient(settings.endpoint ?? 'http://localhost:11434', settings.model);
}
