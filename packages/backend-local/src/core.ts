export type {
  Command,
  CommandContext,
} from "@word-gauntlet/core/domain/commands/Command.js";
export { BeginGame } from "@word-gauntlet/core/domain/commands/BeginGame.js";
export { BeginPractice } from "@word-gauntlet/core/domain/commands/BeginPractice.js";
export { BuyBoost } from "@word-gauntlet/core/domain/commands/BuyBoost.js";
export { EquipTitle } from "@word-gauntlet/core/domain/commands/EquipTitle.js";
export { Forfeit } from "@word-gauntlet/core/domain/commands/Forfeit.js";
export { GrantTitle } from "@word-gauntlet/core/domain/commands/GrantTitle.js";
export { JoinLobby } from "@word-gauntlet/core/domain/commands/JoinLobby.js";
export { OpenLobby } from "@word-gauntlet/core/domain/commands/OpenLobby.js";
export { RequestHint } from "@word-gauntlet/core/domain/commands/RequestHint.js";
export { SetDifficulty } from "@word-gauntlet/core/domain/commands/SetDifficulty.js";
export { StopSession } from "@word-gauntlet/core/domain/commands/StopSession.js";
export { SubmitWord } from "@word-gauntlet/core/domain/commands/SubmitWord.js";
export { TurnTimeout } from "@word-gauntlet/core/domain/commands/TurnTimeout.js";
export { UseBoost } from "@word-gauntlet/core/domain/commands/UseBoost.js";
export { dispatchCommand } from "@word-gauntlet/core/domain/commands/dispatchCommand.js";
export { chatChannel } from "@word-gauntlet/core/domain/channels.js";
export type { GameConfig } from "@word-gauntlet/core/domain/GameConfig.js";
export { createGameConfig } from "@word-gauntlet/core/domain/GameConfig.js";
export { WordDictionary } from "@word-gauntlet/core/domain/entities/WordDictionary.js";
export {
  AchievementError,
  EconomyError,
  GameCommandInputError,
  PlayerNotFoundError,
  SessionStateError,
} from "@word-gauntlet/core/domain/errors/index.js";
export type { Logger } from "@word-gauntlet/core/domain/ports/Logger.js";
export type { MessageBus } from "@word-gauntlet/core/domain/ports/MessageBus.js";
export type { Scheduler } from "@word-gauntlet/core/domain/ports/Scheduler.js";
export {
  getAchievements,
  getInventory,
  getLeaderboard,
  getPlayerStats,
  getProfile,
  getProgress,
  getShop,
} from "@word-gauntlet/core/domain/queries/PlayerQueries.js";
export { getSessionStatus } from "@word-gauntlet/core/domain/queries/SessionQueries.js";
export type { ChatId, PlayerId, TimePoint } from "@word-gauntlet/core/domain/typedefs.js";
export { isLeaderboardCategory, LEADERBOARD_CATEGORIES } from "@word-gauntlet/core/domain/typedefs.js";
export { InMemoryPlayerGateway } from "@word-gauntlet/core/adapters/in-memory/InMemoryPlayerGateway.js";
export { InMemorySessionGateway } from "@word-gauntlet/core/adapters/in-memory/InMemorySessionGateway.js";
