import {
  EventCoordinator,
  PresenceTracker,
  SessionController,
  type EncoderOptions,
} from "@castbridge/core";
import { Client, Events, GatewayIntentBits, type VoiceState } from "discord.js";
import type { FastifyInstance } from "fastify";
import type { Logger } from "pino";
import { deviceConfig, type AppConfig } from "./config.js";
import { DiscordMemberDirectory, DiscordPresence } from "./discord/presence.js";
import { DiscordVoiceTransport } from "./discord/voice-transport.js";
import { LibrespotConnectFactory } from "./librespot/connect.js";
import { LibrespotEngineFactory, type LibrespotEngine } from "./librespot/engine.js";
import { hookScriptPath } from "./librespot/hook-request.js";
import { PlayerEventIngress } from "./librespot/ingress.js";
import { LibrespotService } from "./librespot/service.js";
import { buildServer } from "./server.js";
import type { SpotifySession } from "./spotify/session.js";
import { hookCommand, inviteUrl, resolveGuildId } from "./startup.js";
import { VoiceStateRouter } from "./voice-state-router.js";

type Controller = SessionController<SpotifySession, LibrespotEngine>;

export class CastBridgeBot {
  private readonly client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates],
  });
  private readonly ingress = new PlayerEventIngress();
  private readonly voice: DiscordVoiceTransport;
  private controller: Controller | undefined;
  private server: FastifyInstance | undefined;
  private readonly router: VoiceStateRouter;
  private guildId: string | undefined;
  private coordinatorTask: Promise<void> | undefined;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    private readonly onFatal: (error: unknown) => void,
  ) {
    this.voice = new DiscordVoiceTransport(this.client, logger.child({ component: "voice" }));
    this.router = new VoiceStateRouter(logger.child({ component: "presence" }));
  }

  async start(): Promise<void> {
    const { config, logger } = this;
    const onEvent = config.hookCommand ?? hookCommand([process.execPath, ...process.execArgv, hookScriptPath()]);

    const service = new LibrespotService({ logger: logger.child({ component: "spotify" }) });
    const session = await service.connect({
      username: config.spotifyUsername,
      password: config.spotifyPassword,
      clientId: config.spotifyClientId,
      clientSecret: config.spotifyClientSecret,
      cacheDir: config.cacheDir,
    });

    const encoder: EncoderOptions = {
      inputRate: config.inputSampleRate,
      outputRate: config.outputSampleRate,
      channels: 2,
    };
    const controller: Controller = new SessionController({
      session,
      engines: new LibrespotEngineFactory(this.ingress),
      connects: new LibrespotConnectFactory({
        binaryPath: config.librespotPath,
        hookCommand: onEvent,
        hookUrl: `http://${config.hookHost}:${config.hookPort}/hooks/player-event`,
        hookToken: config.hookToken,
        logger: logger.child({ component: "librespot" }),
      }),
      encoder,
      bridgeCapacity: config.bridgeCapacity,
      logger: logger.child({ component: "controller" }),
    });
    this.controller = controller;

    this.server = await buildServer(config, { ingress: this.ingress, status: controller });
    await this.server.listen({ host: config.hookHost, port: config.hookPort });

    this.client.once(Events.ClientReady, (client) => {
      this.onReady(client, service, controller).catch(this.onFatal);
    });
    this.client.on(Events.VoiceStateUpdate, (oldState, newState) => {
      this.onVoiceStateUpdate(oldState, newState);
    });

    await this.client.login(config.discordToken);
  }

  async stop(): Promise<void> {
    this.logger.info("shutting down");
    if (this.controller) {
      await this.controller.close();
    }
    if (this.coordinatorTask) {
      await this.coordinatorTask;
    }
    if (this.guildId !== undefined) {
      await this.voice.leave(this.guildId);
    }
    await this.client.destroy();
    if (this.server) {
      await this.server.close();
    }
  }

  private async onReady(client: Client<true>, service: LibrespotService, controller: Controller): Promise<void> {
    const { config, logger } = this;
    logger.info({ user: client.user.tag, inviteUrl: inviteUrl(client.user.id) }, "discord client ready");

    const guildId = resolveGuildId([...client.guilds.cache.keys()], config.discordGuildId);
    this.guildId = guildId;

    const members = new DiscordMemberDirectory(client, guildId);
    const tracker = new PresenceTracker({
      controller,
      voice: this.voice,
      guildId,
      watchedUserId: config.discordUserId,
      device: deviceConfig(config),
      logger: logger.child({ component: "presence" }),
    });

    const coordinator = new EventCoordinator({
      controller,
      metadata: service,
      voice: this.voice,
      presence: new DiscordPresence(client),
      members,
      guildId,
      watchedUserId: config.discordUserId,
      voiceBitrate: config.voiceBitrate,
      logger: logger.child({ component: "events" }),
    });

    await this.router.attach(guildId, tracker, () => members.currentChannel(config.discordUserId));
    this.coordinatorTask = coordinator.run().catch((error: unknown) => {
      logger.error({ err: error }, "event coordinator stopped");
    });
  }

  private onVoiceStateUpdate(oldState: VoiceState, newState: VoiceState): void {
    this.router.route({
      guildId: newState.guild.id,
      userId: newState.id,
      oldChannelId: oldState.channelId,
      newChannelId: newState.channelId,
    });
  }
}
