import { chatChannel } from "../channels.js";
import { evaluateAchievements } from "../entities/Achievements.js";
import { recordGameCompleted } from "../entities/Scoring.js";
import { rankPlayers } from "../entities/SessionRules.js";
import type { GameSummary } from "../outcomes.js";
import type { SessionState } from "../ports/SessionGateway.js";
import type { TimePoint } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

/**
 * Ends a game whose roster has run down: the last survivor wins a multiplayer game, a practice
 * game simply ends. The caller has already removed the session from the table; final stats are
 * persisted for multiplayer participants only.
 */
export async function finishSession(
  state: SessionState,
  at: TimePoint,
  ctx: CommandContext,
): Promise<GameSummary> {
  const { playerGateway, bus, config, logger } = ctx;
  const practice = state.phase === "practice";
  const winner = practice ? undefined : state.players[0];

  const summary: GameSummary = {
    chatId: state.chatId,
    mode: practice ? "practice" : "multiplayer",
    reason: practice ? "practiceOver" : "winner",
    winner,
    rounds: state.round,
    difficulty: state.difficulty,
    ranking: rankPlayers(state, state.participants),
  };

  state.phase = "stopped";
  delete state.turn;
  delete state.constraint;

  if (!practice) {
    for (const playerId of state.participants) {
      const { result: unlocked } = await playerGateway.updatePlayer(playerId, (player) => {
        recordGameCompleted(player, playerId === winner);
        return evaluateAchievements(player, config);
      });

      for (const title of unlocked) {
        await bus.publish(chatChannel(state.chatId), {
          type: "AchievementUnlocked",
          chatId: state.chatId,
          playerId,
          title,
          at,
        });
      }
    }
  }

  logger?.info?.("Game over", {
    chatId: state.chatId,
    mode: summary.mode,
    winner,
    rounds: summary.rounds,
  });

  await bus.publish(chatChannel(state.chatId), {
    type: "GameOver",
    at,
    summary,
  });

  return summary;
}
