import { Inject, Injectable, Logger } from '@nestjs/common';
import { Settings, SETTINGS } from '../../config/settings';
import {
  asRecord,
  asString,
  asStringArray,
  errorMessage,
  parseJsonObject,
} from '../../common/utils/object.util';
import { fetchWithTimeout } from '../../common/utils/http.util';
import { cleanText, extractiveSummary } from '../../common/utils/text.util';
import {
  buildClassificationPrompt,
  buildKeyPointsPrompt,
  buildSummaryPrompt,
  buildTitlePrompt,
  EDITOR_SYSTEM_PROMPT,
  KEY_POINTS_SYSTEM_PROMPT,
  TitleStyle,
} from '../prompts/newsletter.prompt';
import { LlmCacheService } from './llm-cache.service';

const RETRYABLE_STATUS = new Set([0, 429, 500, 502, 503, 504]);
const PULL_TIMEOUT_MS = 30 * 60 * 1000;
const TAGS_TIMEOUT_MS = 10_000;

export interface Classification {
  category: string;
  topics: string[];
  sentiment: 'positive' | 'neutral' | 'negative';
}

export interface SummaryResult {
  text: string;
  method: 'llm' | 'extractive';
}

interface GenerationOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

interface JsonResponse {
  ok: boolean;
  status: number;
  raw: string;
  json: Record<string, unknown> | null;
}

function parseSentiment(value: unknown): Classification['sentiment'] {
  const lowered = asString(value).trim().toLowerCase();
  return lowered === 'positive' || lowered === 'negative' ? lowered : 'neutral';
}

function parseClassification(value: unknown): Classification | null {
  const record = asRecord(value);
  const category = asString(record?.category);
  if (!record || !category) {
    return null;
  }
  return {
    category,
    topics: asStringArray(record.topics),
    sentiment: parseSentiment(record.sentiment),
  };
}

function parseText(value: unknown): string | null {
  return typeof value === 'string' && value ? value : null;
}

@Injectable()
export class OllamaClientService {
  private readonly logger = new Logger(OllamaClientService.name);
  private readonly unavailableLogged = new Set<string>();

  constructor(
    @Inject(SETTINGS) private readonly settings: Settings,
    private readonly cache: LlmCacheService,
  ) {}

  async listModels(): Promise<string[] | null> {
    const url = `${this.settings.ollamaHost}/api/tags`;
    const response = await this.safeFetchJson(url, {
      method: 'GET',
      headers: {},
      timeoutMs: TAGS_TIMEOUT_MS,
    });
    if (!response.ok) {
      this.logUnavailable(
        'ollama_tags_failed',
        `${response.status} ${response.raw.slice(0, 120)}`,
      );
      return null;
    }
    const models: unknown = response.json?.models;
    const list: unknown[] = Array.isArray(models) ? models : [];
    return list
      .map((model) => asString(asRecord(model)?.name))
      .filter(Boolean);
  }

  async pullModel(model: string): Promise<boolean> {
    this.logger.log(`model pull start: model=${model}`);
    const startedAt = Date.now();
    const url = `${this.settings.ollamaHost}/api/pull`;
    const response = await this.safeFetchJson(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: model, stream: false }),
      timeoutMs: PULL_TIMEOUT_MS,
    });
    if (!response.ok) {
      this.logger.error(
        `model pull failed: model=${model} status=${response.status}`,
      );
      return false;
    }
    this.logger.log(
      `model pull done: model=${model} elapsedMs=${Date.now() - startedAt}`,
    );
    return true;
  }

  /** Falls back to an extractive summary when the model is unavailable. */
  async summarize(text: string, maxChars = 300): Promise<SummaryResult> {
    const cleaned = cleanText(text);
    if (!cleaned) {
      return { text: '', method: 'extractive' };
    }

    const model = this.settings.primaryModel;
    const summary = await this.cache.remember(
      { operation: 'summary', model, text: cleaned },
      parseText,
      async () => {
        const prompt = buildSummaryPrompt(cleaned);
        const content = await this.chat(EDITOR_SYSTEM_PROMPT, prompt, {
          model,
          temperature: this.settings.defaultTemperature,
          maxTokens: this.settings.defaultMaxTokens,
        });
        return content ? content.trim() : null;
      },
    );
    if (summary) {
      return { text: summary, method: 'llm' };
    }
    return { text: extractiveSummary(cleaned, maxChars), method: 'extractive' };
  }

  async extractKeyPoints(text: string, maxPoints = 5): Promise<string[]> {
    const content = await this.chat(
      KEY_POINTS_SYSTEM_PROMPT,
      buildKeyPointsPrompt(cleanText(text), maxPoints),
      {
        model: this.settings.primaryModel,
        temperature: 0.3,
        maxTokens: this.settings.defaultMaxTokens,
      },
    );
    if (!content) {
      return [];
    }
    return content
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => /^(\d|-|\*)/.test(line))
      .map((line) => line.replace(/^[\d.\-*)\s]+/, '').trim())
      .filter(Boolean)
      .slice(0, maxPoints);
  }

  async classifyContent(
    text: string,
    categories: readonly string[],
  ): Promise<Classification> {
    const fallback: Classification = {
      category: categories[0] ?? 'General',
      topics: [],
      sentiment: 'neutral',
    };
    const cleaned = cleanText(text);
    if (!cleaned || categories.length === 0) {
      return fallback;
    }

    const model = this.settings.classificationModel;
    const result = await this.cache.remember(
      {
        operation: `classify:${categories.join('|')}`,
        model,
        text: cleaned.slice(0, 500),
      },
      parseClassification,
      async () => {
        const prompt = buildClassificationPrompt(cleaned, categories);
        const raw = await this.generate(prompt, {
          model,
          temperature: 0.1,
          maxTokens: 80,
        });
        if (!raw) {
          return null;
        }
        return {
          category: this.matchCategory(raw, categories),
          topics: asStringArray(parseJsonObject(raw)?.topics).slice(0, 3),
          sentiment: parseSentiment(parseJsonObject(raw)?.sentiment),
        };
      },
    );
    return result ?? fallback;
  }

  async generateTitle(
    text: string,
    style: TitleStyle = 'engaging',
  ): Promise<string | null> {
    const model = this.settings.primaryModel;
    return this.cache.remember(
      { operation: `title:${style}`, model, text: text.slice(0, 1000) },
      parseText,
      async () => {
        const raw = await this.generate(buildTitlePrompt(text, style), {
          model,
          temperature: 0.7,
          maxTokens: 30,
        });
        const title = (raw ?? '').trim().replace(/^["']+|["']+$/g, '').trim();
        return title || null;
      },
    );
  }

  private matchCategory(raw: string, categories: readonly string[]): string {
    const parsed = asString(
      parseJsonObject(raw)?.category,
    ).trim().toLowerCase();
    const answer = parsed || raw.trim().toLowerCase();
    const found = categories.find((category) => {
      const lowered = category.toLowerCase();
      return answer.includes(lowered) || (
        answer.length > 0 && lowered.includes(answer)
      );
    });
    return found ?? categories[0] ?? 'General';
  }

  private async chat(
    systemPrompt: string,
    userPrompt: string,
    options: GenerationOptions,
  ): Promise<string | null> {
    const response = await this.postWithRetry('/api/chat', {
      model: options.model,
      stream: false,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      options: {
        temperature: options.temperature,
        num_predict: options.maxTokens,
      },
    });
    const message = asRecord(response?.message);
    const content = asString(message?.content);
    return content || null;
  }

  private async generate(
    prompt: string,
    options: GenerationOptions,
  ): Promise<string | null> {
    const response = await this.postWithRetry('/api/generate', {
      model: options.model,
      prompt,
      stream: false,
      options: {
        temperature: options.temperature,
        num_predict: options.maxTokens,
      },
    });
    const content = asString(response?.response);
    return content || null;
  }

  private async postWithRetry(
    endpoint: string,
    payload: Record<string, unknown>,
  ): Promise<Record<string, unknown> | null> {
    const retries = this.settings.ollamaMaxRetries;
    const backoffSec = this.settings.ollamaRetryBackoffSec;
    const url = `${this.settings.ollamaHost}${endpoint}`;

    for (let attempt = 1; attempt <= retries + 1; attempt += 1) {
      const response = await this.safeFetchJson(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        timeoutMs: this.settings.ollamaTimeoutSec * 1000,
      });

      if (response.ok && response.json) {
        return response.json;
      }
      if (RETRYABLE_STATUS.has(response.status) && attempt <= retries) {
        await this.sleep(backoffSec * 1000 * 2 ** (attempt - 1));
        continue;
      }
      this.logUnavailable(
        `ollama${endpoint.replace(/\//g, '_')}_failed`,
        `${response.status} ${response.raw.slice(0, 180)}`,
      );
      return null;
    }
    return null;
  }

  private async safeFetchJson(
    url: string,
    params: {
      method: 'POST' | 'GET';
      headers: Record<string, string>;
      body?: string;
      timeoutMs: number;
    },
  ): Promise<JsonResponse> {
    const { timeoutMs, ...init } = params;
    try {
      const { res, raw } = await fetchWithTimeout(
        url,
        init,
        timeoutMs,
        async (res) => ({ res, raw: await res.text() }),
      );
      let json: Record<string, unknown> | null = null;
      try {
        json = asRecord(JSON.parse(raw));
      } catch {
        json = null;
      }
      return { ok: res.ok, status: res.status, raw, json };
    } catch (error) {
      return { ok: false, status: 0, raw: errorMessage(error), json: null };
    }
  }

  private logUnavailable(reason: string, detail?: string): void {
    if (this.unavailableLogged.has(reason)) {
      return;
    }
    this.unavailableLogged.add(reason);
    const detailText = cleanText(detail || '');
    if (detailText) {
      this.logger.warn(`LLM unavailable: ${reason} (${detailText})`);
      return;
    }
    this.logger.warn(`LLM unavailable: ${reason}`);
  }

  private async sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
