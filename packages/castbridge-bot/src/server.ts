import Fastify, { type FastifyInstance } from "fastify";
import { PlayerEventHookSchema, type ConnectDeviceConfig } from "@castbridge/contracts";
import { isHookAuthorized } from "./auth.js";
import type { AppConfig } from "./config.js";
import type { PlayerEventIngress } from "./librespot/ingress.js";
import { toPlaybackEvent } from "./librespot/player-events.js";

export interface CastingStatus {
  readonly isEnabled: boolean;
  readonly device: ConnectDeviceConfig | undefined;
}

interface ServerDeps {
  ingress: PlayerEventIngress;
  status: CastingStatus;
}

export async function buildServer(config: AppConfig, deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({
    bodyLimit: 16_384,
    logger: {
      level: config.logLevel,
      transport: process.env.NODE_ENV === "production" ? undefined : { target: "pino-pretty" },
    },
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "unhandled request error");
    reply.code(500).send({ error: "internal_error", requestId: request.id });
  });

  app.get("/health", async () => ({ ok: true, ts: Date.now() }));

  app.get("/ready", async () => ({
    ok: true,
    enabled: deps.status.isEnabled,
    deviceName: deps.status.device?.deviceName ?? config.deviceName,
  }));

  app.post("/hooks/player-event", async (request, reply) => {
    if (!isHookAuthorized(request.headers.authorization, config.hookToken)) {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const parsed = PlayerEventHookSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    const { sessionKey, ...hook } = parsed.data;
    const event = toPlaybackEvent(hook);
    if (!deps.ingress.deliver(sessionKey, event)) {
      return reply.code(404).send({ error: "unknown_session" });
    }

    request.log.debug({ event: event.type, sessionKey }, "player event accepted");
    return reply.code(202).send({ accepted: true, type: event.type });
  });

  return app;
}
