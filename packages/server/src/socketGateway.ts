import type { WebSocket } from "ws";

import {
  CancelOffer,
  Connect,
  CreateOffer,
  Disconnect,
  GameCommandInputError,
  JoinOffer,
  LOBBY_CHANNEL,
  LeavePostMatch,
  RequestRematch,
  SILENT_REJECTIONS,
  SkipVote,
  Spectate,
  SubmitGuess,
  Surrender,
  Unspectate,
  connectionChannel,
  dispatchCommand,
} from "./core.js";
import type {
  Command,
  CommandContext,
  ConnectionId,
  Logger,
  MessageBus,
  Outcome,
  TimePoint,
} from "./core.js";
import type { CommandQueue } from "./CommandQueue.js";

type DispatchCommand = (command: Command, context: CommandContext) => Promise<Outcome>;

export interface SocketBus extends MessageBus {
  attach(channel: string, socket: WebSocket): void;
  detach(channel: string, socket: WebSocket): void;
}

export interface SocketGatewayOptions {
  readonly bus: SocketBus;
  readonly queue: CommandQueue;
  readonly createContext: () => CommandContext;
  readonly logger: Logger;
  readonly dispatch?: DispatchCommand;
  readonly now?: () => TimePoint;
}

type InboundMessage = Readonly<Record<string, unknown>>;

/**
 * Turns one inbound client message into a command. Throws {@link GameCommandInputError} for
 * anything that is not a well-formed message of a known type.
 */
export function parseInboundMessage(
  connectionId: ConnectionId,
  raw: string,
  at: TimePoint,
): Command {
  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch {
    throw GameCommandInputError.because(["Message must be valid JSON"]);
  }

  if (typeof message !== "object" || message === null || Array.isArray(message)) {
    throw GameCommandInputError.because(["Message must be a JSON object"]);
  }
  const fields: InboundMessage = Object.fromEntries(Object.entries(message));

  switch (fields["type"]) {
    case "connect":
      return new Connect(
        connectionId,
        stringField(fields, "handle"),
        optionalStringField(fields, "nickname"),
        at,
      );
    case "create_offer":
      return new CreateOffer(connectionId, fields["settings"], at);
    case "cancel_offer":
      return new CancelOffer(connectionId, at);
    case "join_offer":
      return new JoinOffer(connectionId, stringField(fields, "offerId"), at);
    case "spectate":
      return new Spectate(connectionId, stringField(fields, "matchId"), at);
    case "unspectate":
      return new Unspectate(connectionId, at);
    case "submit_guess":
      return new SubmitGuess(
        connectionId,
        stringField(fields, "matchId"),
        stringField(fields, "text"),
        at,
      );
    case "surrender":
      return new Surrender(connectionId, stringField(fields, "matchId"), at);
    case "skip_vote":
      return new SkipVote(connectionId, stringField(fields, "matchId"), at);
    case "request_rematch":
      return new RequestRematch(connectionId, stringField(fields, "matchId"), at);
    case "leave_post_match":
      return new LeavePostMatch(connectionId, stringField(fields, "matchId"), at);
    default:
      throw GameCommandInputError.because([
        `Unknown message type: ${String(fields["type"])}`,
      ]);
  }
}

/**
 * Session glue between sockets and the command queue: mints a connection id per socket,
 * subscribes it to its own channel and the lobby, and answers rejected actions.
 */
export class SocketGateway {
  readonly #bus: SocketBus;
  readonly #queue: CommandQueue;
  readonly #createContext: () => CommandContext;
  readonly #logger: Logger;
  readonly #dispatch: DispatchCommand;
  readonly #now: () => TimePoint;
  #sockets = new Map<ConnectionId, WebSocket>();
  #nextConnectionId = 1;

  constructor(options: SocketGatewayOptions) {
    this.#bus = options.bus;
    this.#queue = options.queue;
    this.#createContext = options.createContext;
    this.#logger = options.logger;
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#now = options.now ?? Date.now;
  }

  get openConnections(): number {
    return this.#sockets.size;
  }

  open(socket: WebSocket): ConnectionId {
    const connectionId: ConnectionId = `conn-${this.#nextConnectionId++}`;
    this.#sockets.set(connectionId, socket);
    this.#bus.attach(connectionChannel(connectionId), socket);
    this.#bus.attach(LOBBY_CHANNEL, socket);
    this.#logger.info("Socket opened", { connectionId });
    return connectionId;
  }

  async receive(connectionId: ConnectionId, raw: string): Promise<void> {
    let action = "unknown";
    try {
      const outcome = await this.#queue.run(async () => {
        const command = parseInboundMessage(connectionId, raw, this.#now());
        action = command.type;
        return this.#dispatch(command, this.#createContext());
      });

      if (outcome.ok) return;
      if (SILENT_REJECTIONS.has(outcome.reason)) {
        this.#logger.debug("Out-of-turn action dropped", {
          connectionId,
          action,
          reason: outcome.reason,
        });
        return;
      }
      await this.#reject(connectionId, action, outcome.reason);
    } catch (error) {
      if (error instanceof GameCommandInputError) {
        this.#logger.warn("Malformed message", { connectionId, issues: error.issues });
        await this.#reject(connectionId, action, "malformed", error.issues);
        return;
      }
      this.#logger.error("Message handling failed", { connectionId, action, error });
      await this.#reject(connectionId, action, "internal-error");
    }
  }

  async close(connectionId: ConnectionId): Promise<void> {
    const socket = this.#sockets.get(connectionId);
    this.#sockets.delete(connectionId);
    if (socket) {
      this.#bus.detach(connectionChannel(connectionId), socket);
      this.#bus.detach(LOBBY_CHANNEL, socket);
    }

    try {
      await this.#queue.run(() =>
        this.#dispatch(new Disconnect(connectionId, this.#now()), this.#createContext()),
      );
    } catch (error) {
      this.#logger.error("Disconnect handling failed", { connectionId, error });
    }
  }

  async #reject(
    connectionId: ConnectionId,
    action: string,
    reason: string,
    issues?: readonly string[],
  ): Promise<void> {
    await this.#bus.publish(connectionChannel(connectionId), {
      type: "action_rejected",
      action,
      reason,
      ...(issues ? { issues } : {}),
    });
  }
}

function stringField(fields: InboundMessage, key: string): string {
  const value = fields[key];
  if (typeof value !== "string") {
    throw GameCommandInputError.because([`${key} must be a string`]);
  }
  return value;
}

function optionalStringField(fields: InboundMessage, key: string): string | undefined {
  return fields[key] === undefined ? undefined : stringField(fields, key);
}
