// src/core/api/telegram.ts
import axios, { type AxiosInstance } from 'axios';
import { API_REQUEST_TIMEOUT } from '../config/constants.js';
import type { TelegramSettings } from '../config/settings.js';
import { BoostError, toBoostError } from '../errors.js';

const TELEGRAM_API = 'https://api.telegram.org';

export interface TelegramNotifierOptions {
  http?: AxiosInstance;
}

export class TelegramNotifier {
  private http: AxiosInstance;

  constructor(
    private settings: Pick<TelegramSettings, 'botToken' | 'chatId' | 'topicId' | 'silent'>,
    options: TelegramNotifierOptions = {}
  ) {
    this.http = options.http ?? axios.create({ timeout: API_REQUEST_TIMEOUT });
  }

  /** Send an HTML-formatted message to the configured chat (and topic, when set). */
  async send(html: string): Promise<void> {
    const body: Record<string, unknown> = {
      chat_id: this.settings.chatId,
      text: html,
      parse_mode: 'HTML',
      disable_notification: this.settings.silent,
    };
    if (this.settings.topicId) {
      body.message_thread_id = this.settings.topicId;
    }

    try {
      await this.http.post(`${TELEGRAM_API}/bot${this.settings.botToken}/sendMessage`, body);
    } catch (error) {
      // The request URL embeds the bot token
      const failure = toBoostError(error);
      throw new BoostError(
        failure.code,
        failure.message.split(this.settings.botToken).join('***'),
        failure.retryable,
        failure.suggestion
      );
    }
  }
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
