import type { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { env } from '../config/env';
import type { AccountProfile } from '../types/steam';
import { TransportError, errorMessage } from '../utils/errors';
import { moduleLogger } from '../utils/logger';
import { STEAM_API_BASE, createSteamHttpClient } from './steamTransport';

const summariesSchema = z.object({
  response: z.object({
    players: z.array(
      z
        .object({
          personaname: z.string().optional(),
          profileurl: z.string().optional(),
          avatar: z.string().optional(),
          avatarfull: z.string().optional()
        })
        .passthrough()
    )
  })
});

const bansSchema = z.object({
  players: z.array(
    z
      .object({
        VACBanned: z.boolean().optional(),
        NumberOfVACBans: z.number().optional(),
        CommunityBanned: z.boolean().optional(),
        EconomyBan: z.string().optional()
      })
      .passthrough()
  )
});

const ownedGamesSchema = z.object({
  response: z
    .object({
      game_count: z.number().optional()
    })
    .passthrough()
});

const log = moduleLogger('profile');

export class SteamProfileService {
  constructor(
    private readonly apiKey: string = env.STEAM_WEB_API_KEY,
    private readonly http: AxiosInstance = createSteamHttpClient()
  ) {}

  get isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * Summary, bans and owned games are fetched together; a failing call only
   * leaves its fields out. Returns null when no API key is configured.
   */
  async fetchProfile(steamid: string, nowSec = Math.floor(Date.now() / 1000)): Promise<AccountProfile | null> {
    if (!this.isConfigured) {
      return null;
    }

    const [summary, bans, games] = await Promise.allSettled([
      this.get('/ISteamUser/GetPlayerSummaries/v2/', { steamids: steamid }, summariesSchema),
      this.get('/ISteamUser/GetPlayerBans/v1/', { steamids: steamid }, bansSchema),
      this.get(
        '/IPlayerService/GetOwnedGames/v1/',
        { steamid, include_appinfo: 'false', include_played_free_games: 'true' },
        ownedGamesSchema
      )
    ]);

    const profile: AccountProfile = { updatedAt: nowSec };

    if (summary.status === 'fulfilled') {
      const player = summary.value.response.players[0];
      if (player) {
        profile.displayName = player.personaname;
        profile.profileUrl = player.profileurl;
        profile.avatarUrl = player.avatarfull ?? player.avatar;
      }
    } else {
      log.warn({ steamid, err: errorMessage(summary.reason) }, 'GetPlayerSummaries failed');
    }

    if (bans.status === 'fulfilled') {
      const player = bans.value.players[0];
      if (player) {
        profile.vacBanned = player.VACBanned ?? false;
        profile.vacBanCount = player.NumberOfVACBans ?? 0;
        profile.communityBanned = player.CommunityBanned ?? false;
        profile.economyBan = player.EconomyBan ?? 'none';
      }
    } else {
      log.warn({ steamid, err: errorMessage(bans.reason) }, 'GetPlayerBans failed');
    }

    if (games.status === 'fulfilled') {
      profile.gameCount = games.value.response.game_count;
    } else {
      log.warn({ steamid, err: errorMessage(games.reason) }, 'GetOwnedGames failed');
    }

    return profile;
  }

  private async get<T>(
    endpoint: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(`${STEAM_API_BASE}${endpoint}`, {
        params: { key: this.apiKey, ...params }
      });
    } catch (error) {
      throw new TransportError(`Steam Web API ${endpoint} failed: ${errorMessage(error)}`, undefined, {
        cause: error
      });
    }

    if (response.status !== 200) {
      throw new TransportError(`Steam Web API ${endpoint} failed with HTTP ${response.status}`, response.status);
    }

    return schema.parse(response.data);
  }
}
