import {
  BeginGame,
  BeginPractice,
  BuyBoost,
  EquipTitle,
  Forfeit,
  GameCommandInputError,
  JoinLobby,
  OpenLobby,
  RequestHint,
  SessionStateError,
  SetDifficulty,
  StopSession,
  SubmitWord,
  UseBoost,
  getAchievements,
  getInventory,
  getLeaderboard,
  getPlayerStats,
  getProfile,
  getProgress,
  getShop,
  isLeaderboardCategory,
  LEADERBOARD_CATEGORIES,
} from "./core.js";
import type { ChatId, Command, CommandContext, PlayerId, TimePoint } from "./core.js";

export type DispatchCommand = <TResult>(
  command: Command<TResult>,
  context: CommandContext,
) => Promise<TResult>;

export interface ChatMessage {
  readonly chatId: ChatId;
  readonly userId: PlayerId;
  readonly displayName: string;
  readonly text: string;
  readonly at: TimePoint;
}

export type IgnoreReason = "no-game" | "not-your-turn" | "discarded";

export type ChatReply =
  | { readonly action: "ignored"; readonly reason: IgnoreReason }
  | { readonly action: string; readonly result: unknown };

export interface ChatRouterOptions {
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
}

export const HELP_TEXT: ReadonlyArray<{ readonly command: string; readonly description: string }> = [
  { command: "/lobby", description: "Open a lobby in this chat" },
  { command: "/join", description: "Join the open lobby" },
  { command: "/difficulty <easy|medium|hard>", description: "Set the lobby difficulty" },
  { command: "/begin", description: "Start the game with everyone in the lobby" },
  { command: "/practice [level]", description: "Play a solo practice game" },
  { command: "/stop", description: "Stop the game in this chat" },
  { command: "/skip_boost", description: "Spend a skip to pass your turn" },
  { command: "/rebound", description: "Spend a rebound to pass your turn" },
  { command: "/forfeit", description: "Pass your turn for free" },
  { command: "/hint", description: "Spend a hint for word suggestions" },
  { command: "/mystats", description: "Show your lifetime stats" },
  { command: "/leaderboard [category]", description: "Top players by score, words, streak, longest or wins" },
  { command: "/profile", description: "Show your profile" },
  { command: "/achievements", description: "List unlocked and locked titles" },
  { command: "/settitle <TITLE>", description: "Equip an unlocked title" },
  { command: "/progress", description: "Progress toward each title" },
  { command: "/shop", description: "Boost prices" },
  { command: "/buy_hint", description: "Buy a hint" },
  { command: "/buy_skip", description: "Buy a skip" },
  { command: "/buy_rebound", description: "Buy a rebound" },
  { command: "/inventory", description: "Your balance and boosts" },
];

interface ParsedCommand {
  readonly name: string;
  readonly args: readonly string[];
}

/** `/join@SomeBot extra` → `{ name: "join", args: ["extra"] }`; plain text → `undefined`. */
export function parseCommand(text: string): ParsedCommand | undefined {
  const trimmed = text.trim();
  if (!trimmed.startsWith("/")) {
    return undefined;
  }
  const [head = "", ...args] = trimmed.slice(1).split(/\s+/);
  const [name = ""] = head.split("@");
  return { name: name.toLowerCase(), args };
}

/**
 * Maps inbound chat text to engine commands and read models. Every sender is registered (or has
 * their display name refreshed) before the text is interpreted.
 */
export function createChatRouter({ createContext, dispatch }: ChatRouterOptions) {
  async function submitWord(ctx: CommandContext, message: ChatMessage): Promise<ChatReply> {
    const state = await ctx.sessionGateway.findSession(message.chatId);
    if (!state || !state.turn) {
      return { action: "ignored", reason: "no-game" };
    }
    if (state.turn.playerId !== message.userId) {
      return { action: "ignored", reason: "not-your-turn" };
    }

    try {
      const report = await dispatch(
        new SubmitWord(message.chatId, message.userId, message.text, message.at),
        ctx,
      );
      return report === null
        ? { action: "ignored", reason: "discarded" }
        : { action: "submit", result: report };
    } catch (error) {
      // The session ended or the turn moved on between the lookup and the command.
      if (error instanceof SessionStateError && error.code === "NoActiveSession") {
        return { action: "ignored", reason: "no-game" };
      }
      if (error instanceof SessionStateError && error.code === "NotYourTurn") {
        return { action: "ignored", reason: "not-your-turn" };
      }
      throw error;
    }
  }

  async function turnCommand(
    action: string,
    command: Command<unknown>,
    ctx: CommandContext,
  ): Promise<ChatReply> {
    const result = await dispatch(command, ctx);
    return result === null ? { action: "ignored", reason: "discarded" } : { action, result };
  }

  async function handle(message: ChatMessage): Promise<ChatReply> {
    const ctx = createContext();
    const { chatId, userId, displayName, at } = message;

    await ctx.playerGateway.ensurePlayer(userId, displayName.trim() || userId, at);

    const parsed = parseCommand(message.text);
    if (!parsed) {
      return submitWord(ctx, message);
    }

    const [firstArg = ""] = parsed.args;

    switch (parsed.name) {
      case "start":
      case "help":
        return { action: "help", result: { commands: HELP_TEXT } };
      case "lobby":
        return {
          action: "lobby",
          result: await dispatch(new OpenLobby(chatId, userId, displayName, at), ctx),
        };
      case "join":
        return {
          action: "join",
          result: await dispatch(new JoinLobby(chatId, userId, displayName, at), ctx),
        };
      case "difficulty":
        return {
          action: "difficulty",
          result: await dispatch(new SetDifficulty(chatId, userId, firstArg, at), ctx),
        };
      case "begin":
        return {
          action: "begin",
          result: await dispatch(new BeginGame(chatId, userId, at), ctx),
        };
      case "practice":
        return {
          action: "practice",
          result: await dispatch(
            new BeginPractice(chatId, userId, displayName, firstArg || "easy", at),
            ctx,
          ),
        };
      case "stop":
        return {
          action: "stop",
          result: await dispatch(new StopSession(chatId, userId, at), ctx),
        };
      case "skip_boost":
        return turnCommand("skip", new UseBoost(chatId, userId, "skip", at), ctx);
      case "rebound":
        return turnCommand("rebound", new UseBoost(chatId, userId, "rebound", at), ctx);
      case "forfeit":
        return turnCommand("forfeit", new Forfeit(chatId, userId, at), ctx);
      case "hint":
        return turnCommand("hint", new RequestHint(chatId, userId, at), ctx);
      case "mystats":
        return { action: "mystats", result: await getPlayerStats(ctx, userId) };
      case "leaderboard": {
        const category = (firstArg || "score").toLowerCase();
        if (!isLeaderboardCategory(category)) {
          throw GameCommandInputError.because([
            `Leaderboard category must be one of: ${LEADERBOARD_CATEGORIES.join(", ")}`,
          ]);
        }
        return { action: "leaderboard", result: await getLeaderboard(ctx, category) };
      }
      case "profile":
        return { action: "profile", result: await getProfile(ctx, userId) };
      case "achievements":
        return { action: "achievements", result: await getAchievements(ctx, userId) };
      case "settitle":
        return {
          action: "settitle",
          result: await dispatch(new EquipTitle(userId, firstArg, at), ctx),
        };
      case "progress":
        return { action: "progress", result: await getProgress(ctx, userId) };
      case "shop":
        return { action: "shop", result: getShop(ctx.config) };
      case "buy_hint":
      case "buy_skip":
      case "buy_rebound":
        return {
          action: "buy",
          result: await dispatch(new BuyBoost(userId, parsed.name.slice("buy_".length), at), ctx),
        };
      case "inventory":
        return { action: "inventory", result: await getInventory(ctx, userId, at) };
      default:
        throw GameCommandInputError.because([`Unknown command: /${parsed.name}`]);
    }
  }

  return { handle };
}

export type ChatRouter = ReturnType<typeof createChatRouter>;
