import { Hono } from "hono";
import type { Context, Next } from "hono";
import { z } from "zod";

import { createChatRouter, type DispatchCommand } from "./chatRouter.js";
import {
  AchievementError,
  EconomyError,
  GameCommandInputError,
  GrantTitle,
  PlayerNotFoundError,
  SessionStateError,
  getLeaderboard,
  getSessionStatus,
  isLeaderboardCategory,
  LEADERBOARD_CATEGORIES,
} from "./core.js";
import type { CommandContext, Logger } from "./core.js";

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
  /** Enables `POST /api/admin/titles` when set */
  readonly adminToken?: string;
}

const ChatMessageBody = z.object({
  userId: z.string().trim().min(1),
  displayName: z.string().default(""),
  text: z.string(),
});

const GrantTitleBody = z.object({
  playerId: z.string().trim().min(1),
  title: z.string().trim().min(1),
});

const LimitQuery = z.coerce.number().int().min(1).max(100).default(10);

type ErrorStatus = 400 | 401 | 404 | 409 | 422 | 500;

interface ErrorBody {
  readonly kind: string;
  readonly code: string;
  readonly message: string;
  readonly retryAfterMs?: number;
  readonly issues?: readonly string[];
}

export function createBackendApp({
  port,
  logger,
  createContext,
  dispatch,
  adminToken,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();
  const router = createChatRouter({ createContext, dispatch });

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type, X-Admin-Token");
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c) =>
    c.json({
      ok: true,
      timestamp: Date.now(),
      config: { port },
      dictionarySize: createContext().dictionary.size,
    }),
  );

  app.post("/api/chats/:chatId/messages", async (c) => {
    const chatId = c.req.param("chatId");
    const body = ChatMessageBody.safeParse(await c.req.json().catch(() => null));

    if (!body.success) {
      return c.json(
        inputError(["userId and text are required; displayName is optional"]),
        400,
      );
    }

    try {
      const reply = await router.handle({ chatId, ...body.data, at: Date.now() });
      return c.json(reply);
    } catch (error) {
      const [status, payload] = describeError(error, logger, { chatId });
      return c.json({ error: payload }, status);
    }
  });

  app.get("/api/chats/:chatId/session", async (c) => {
    const chatId = c.req.param("chatId");
    try {
      return c.json(await getSessionStatus(createContext(), chatId, Date.now()));
    } catch (error) {
      const [status, payload] = describeError(error, logger, { chatId });
      return c.json({ error: payload }, status);
    }
  });

  app.get("/api/leaderboard/:category", async (c) => {
    const category = c.req.param("category").toLowerCase();
    const limit = LimitQuery.safeParse(c.req.query("limit"));

    if (!isLeaderboardCategory(category)) {
      return c.json(
        inputError([`category must be one of: ${LEADERBOARD_CATEGORIES.join(", ")}`]),
        400,
      );
    }
    if (!limit.success) {
      return c.json(inputError(["limit must be an integer between 1 and 100"]), 400);
    }

    const entries = await getLeaderboard(createContext(), category, limit.data);
    return c.json({ category, entries });
  });

  app.post("/api/admin/titles", async (c) => {
    if (adminToken === undefined) {
      return c.json(
        { error: { kind: "AdminError", code: "Disabled", message: "Admin routes are disabled" } },
        404,
      );
    }
    if (c.req.header("x-admin-token") !== adminToken) {
      logger.warn("Rejected admin request", { path: c.req.path });
      return c.json(
        { error: { kind: "AdminError", code: "Unauthorized", message: "Invalid admin token" } },
        401,
      );
    }

    const body = GrantTitleBody.safeParse(await c.req.json().catch(() => null));
    if (!body.success) {
      return c.json(inputError(["playerId and title are required"]), 400);
    }

    try {
      const result = await dispatch(
        new GrantTitle(body.data.playerId, body.data.title, Date.now()),
        createContext(),
      );
      return c.json(result);
    } catch (error) {
      const [status, payload] = describeError(error, logger, { playerId: body.data.playerId });
      return c.json({ error: payload }, status);
    }
  });

  return app;
}

function inputError(issues: readonly string[]): { readonly error: ErrorBody } {
  const error = GameCommandInputError.because(issues);
  return {
    error: { kind: error.kind, code: "InvalidInput", message: error.message, issues: error.issues },
  };
}

/** Maps a thrown error onto the HTTP status and payload returned to the relay. */
export function describeError(
  error: unknown,
  logger: Logger,
  meta: Readonly<Record<string, unknown>> = {},
): [ErrorStatus, ErrorBody] {
  if (error instanceof SessionStateError) {
    return [409, { kind: error.kind, code: error.code, message: error.message }];
  }
  if (error instanceof EconomyError) {
    return [
      422,
      {
        kind: error.kind,
        code: error.code,
        message: error.message,
        ...(error.retryAfterMs !== undefined ? { retryAfterMs: error.retryAfterMs } : {}),
      },
    ];
  }
  if (error instanceof AchievementError) {
    return [422, { kind: error.kind, code: error.code, message: error.message }];
  }
  if (error instanceof GameCommandInputError) {
    return [
      400,
      { kind: error.kind, code: "InvalidInput", message: error.message, issues: error.issues },
    ];
  }
  if (error instanceof PlayerNotFoundError) {
    return [404, { kind: "NotFound", code: "PlayerNotFound", message: error.message }];
  }

  logger.error("Unexpected error while handling request", { ...meta, error });
  return [500, { kind: "InternalError", code: "Unexpected", message: "Internal error" }];
}
