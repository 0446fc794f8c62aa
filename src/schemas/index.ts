import type { PayloadSpec } from '../api/types.js'
import { AccountDtoSchema, ActiveShardDtoSchema } from './account.js'
import { ChampionInfoSchema } from './champion.js'
import { ChampionMasteryDtoSchema, ChampionMasteryListSchema, MasteryScoreSchema } from './mastery.js'
import { LeagueEntryListSchema, LeagueListDtoSchema } from './league.js'
import { MatchDtoSchema, MatchIdsSchema } from './match.js'
import { MatchTimelineDtoSchema } from './timeline.js'
import { CurrentGameInfoSchema, FeaturedGamesSchema } from './spectator.js'
import { PlatformDataDtoSchema, ShardStatusSchema } from './status.js'
import { SummonerDtoSchema } from './summoner.js'
import {
  ChampionDetailListSchema,
  ChampionListSchema,
  LanguageListSchema,
  QueueListSchema,
  VersionListSchema,
} from './ddragon.js'

/**
 * エンドポイントごとのペイロード定義
 *
 * type は formatResult の見出しになる。
 */
export const PAYLOADS = {
  account: { type: 'AccountDto', schema: AccountDtoSchema },
  activeShard: { type: 'ActiveShardDto', schema: ActiveShardDtoSchema },
  championMastery: { type: 'ChampionMasteryDto', schema: ChampionMasteryDtoSchema },
  championMasteries: { type: 'ChampionMasteryDto[]', schema: ChampionMasteryListSchema },
  masteryScore: { type: 'MasteryScore', schema: MasteryScoreSchema },
  championRotation: { type: 'ChampionInfo', schema: ChampionInfoSchema },
  leagueEntries: { type: 'LeagueEntryDto[]', schema: LeagueEntryListSchema },
  leagueList: { type: 'LeagueListDto', schema: LeagueListDtoSchema },
  shardStatus: { type: 'ShardStatus', schema: ShardStatusSchema },
  platformData: { type: 'PlatformDataDto', schema: PlatformDataDtoSchema },
  matchIds: { type: 'MatchIds', schema: MatchIdsSchema },
  match: { type: 'MatchDto', schema: MatchDtoSchema },
  matchTimeline: { type: 'MatchTimelineDto', schema: MatchTimelineDtoSchema },
  currentGame: { type: 'CurrentGameInfo', schema: CurrentGameInfoSchema },
  featuredGames: { type: 'FeaturedGames', schema: FeaturedGamesSchema },
  summoner: { type: 'SummonerDto', schema: SummonerDtoSchema },
  versions: { type: 'Versions', schema: VersionListSchema },
  languages: { type: 'Languages', schema: LanguageListSchema },
  championList: { type: 'ChampionList', schema: ChampionListSchema },
  championDetail: { type: 'ChampionDetailList', schema: ChampionDetailListSchema },
  queues: { type: 'Queues', schema: QueueListSchema },
} as const satisfies Record<string, PayloadSpec<unknown>>

export * from './account.js'
export * from './champion.js'
export * from './mastery.js'
export * from './league.js'
export * from './match.js'
export * from './timeline.js'
export * from './spectator.js'
export * from './status.js'
export * from './summoner.js'
export * from './ddragon.js'
export * from './error.js'
