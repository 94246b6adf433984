// src/core/api/podhome.ts
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { API_REQUEST_TIMEOUT } from '../config/constants.js';
import type { PodcastHostSettings } from '../config/settings.js';
import { BoostError, ErrorCode, toBoostError } from '../errors.js';
import type { Episode } from '../types/index.js';

const episodeSchema = z
  .object({
    episode_id: z.union([z.string(), z.number()]).transform(String),
    episode_nr: z.coerce.number().int().optional(),
    title: z.string().default(''),
    publish_date: z.string().min(1),
    description: z.string().nullish().transform((v) => v ?? undefined),
    enclosure_url: z.string().nullish().transform((v) => v ?? undefined),
  })
  .passthrough();

const episodeListSchema = z.array(episodeSchema);

export interface PodcastHostClientOptions {
  http?: AxiosInstance;
}

/** Client for the podcast host's episode API, authenticated by an `X-API-KEY` header. */
export class PodcastHostClient {
  private http: AxiosInstance;

  constructor(private settings: PodcastHostSettings, options: PodcastHostClientOptions = {}) {
    this.http =
      options.http ??
      axios.create({
        timeout: API_REQUEST_TIMEOUT,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  async listEpisodes(): Promise<Episode[]> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(this.settings.episodesUrl, { headers: this.authHeaders() });
      data = response.data;
    } catch (error) {
      throw toBoostError(error);
    }

    const parsed = episodeListSchema.safeParse(data);
    if (!parsed.success) {
      throw new BoostError(
        ErrorCode.API_ERROR,
        `Unexpected episode list: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
        false,
        undefined,
        { url: this.settings.episodesUrl }
      );
    }

    return parsed.data.map(({ episode_id, episode_nr, title, publish_date, description, enclosure_url }) => ({
      episode_id,
      episode_nr,
      title,
      publish_date,
      description,
      enclosure_url,
    }));
  }

  /** The episode with the earliest publish date, or undefined when none is listed. */
  async getEarliestScheduledEpisode(): Promise<Episode | undefined> {
    const episodes = await this.listEpisodes();
    return [...episodes].sort((a, b) => Date.parse(a.publish_date) - Date.parse(b.publish_date))[0];
  }

  async publishNow(episodeId: string): Promise<void> {
    await this.post({ episode_id: episodeId, publish_now: true });
  }

  async reschedule(episodeId: string, publishDate: string): Promise<void> {
    await this.post({ episode_id: episodeId, publish_date: publishDate });
  }

  private async post(body: Record<string, unknown>): Promise<void> {
    try {
      await this.http.post(this.settings.scheduleUrl, body, { headers: this.authHeaders() });
    } catch (error) {
      throw toBoostError(error);
    }
  }

  private authHeaders(): Record<string, string> {
    return { 'X-API-KEY': this.settings.apiKey };
  }
}
