// src/core/api/companion.ts
import axios, { type AxiosInstance } from 'axios';
import { API_REQUEST_TIMEOUT } from '../config/constants.js';
import type { CompanionSettings } from '../config/settings.js';
import { toBoostError } from '../errors.js';

export interface CompanionBotClientOptions {
  http?: AxiosInstance;
}

/** Webhook endpoints of the companion chat bot that mirrors episode and donation state. */
export class CompanionBotClient {
  private http: AxiosInstance;
  private baseUrl: string;

  constructor(private settings: CompanionSettings, options: CompanionBotClientOptions = {}) {
    this.http = options.http ?? axios.create({ timeout: API_REQUEST_TIMEOUT });
    this.baseUrl = settings.baseUrl.replace(/\/+$/, '');
  }

  async updateDonations(episodeId: string, amount: number): Promise<void> {
    await this.post('/update-donations', { episode_id: episodeId, amount: String(amount) });
  }

  async syncEpisodes(): Promise<void> {
    await this.post('/sync-episodes');
  }

  private async post(path: string, body?: Record<string, unknown>): Promise<void> {
    try {
      await this.http.post(`${this.baseUrl}${path}`, body, {
        headers: { 'X-API-KEY': this.settings.webhookToken },
      });
    } catch (error) {
      throw toBoostError(error);
    }
  }
}
