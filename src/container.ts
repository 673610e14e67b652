import env from "./config/env";
import StreamTransport from "./services/StreamTransport";
import type { SocketFactory } from "./services/StreamTransport";
import StreamSession from "./services/StreamSession";
import SubscriptionRegistry from "./services/SubscriptionRegistry";
import SymbolMarketDirectory from "./services/SymbolMarketDirectory";
import VICascadeController from "./services/VICascadeController";
import OrderEventMonitor from "./services/OrderEventMonitor";
import { HealthService } from "./services/HealthService";
import type { Clock } from "./utils/clock";
import { systemClock } from "./utils/clock";

export interface AppContainer {
  transport: StreamTransport;
  session: StreamSession;
  registry: SubscriptionRegistry;
  marketDirectory: SymbolMarketDirectory;
  viController: VICascadeController;
  orderMonitor: OrderEventMonitor | null;
  healthService: HealthService;
}

/**
 * Seams for tests: a fake socket and a manual clock
 */
export interface ContainerOverrides {
  socketFactory?: SocketFactory;
  clock?: Clock;
  token?: string;
  accountEventsEnabled?: boolean;
}

export const createContainer = (overrides: ContainerOverrides = {}): AppContainer => {
  const clock = overrides.clock ?? systemClock;
  const token = overrides.token ?? env.streamToken;

  const transport = new StreamTransport({
    handshakeTimeoutMs: env.handshakeTimeoutMs,
    keepaliveIntervalMs: env.keepaliveIntervalMs,
    keepaliveTimeoutMs: env.keepaliveTimeoutMs,
    maxOutboundQueue: env.outboundQueueSize,
    socketFactory: overrides.socketFactory,
  });

  // One session and one registry shared by every consumer
  const session = new StreamSession(transport, {
    endpoint: env.streamUrl,
    token,
    reconnect: {
      maxAttempts: env.reconnectMaxAttempts,
      baseDelayMs: env.reconnectBaseDelayMs,
      maxDelayMs: env.reconnectMaxDelayMs,
    },
    clock,
  });

  const registry = new SubscriptionRegistry(session, {
    token,
    maxSubscriptions: env.maxSubscriptions,
    inboundQueueSize: env.inboundQueueSize,
    clock,
  });

  const marketDirectory = new SymbolMarketDirectory(env.viDefaultMarket);

  const viController = new VICascadeController(registry, session, marketDirectory, {
    gracePeriodMs: env.viUnsubscribeGraceMs,
    clock,
  });

  const accountEventsEnabled = overrides.accountEventsEnabled ?? env.accountEventsEnabled;
  const orderMonitor = accountEventsEnabled ? new OrderEventMonitor(registry, clock) : null;

  const healthService = new HealthService({
    session,
    registry,
    viController,
    orderMonitor: orderMonitor ?? undefined,
    clock,
  });

  return {
    transport,
    session,
    registry,
    marketDirectory,
    viController,
    orderMonitor,
    healthService,
  };
};

let activeContainer: AppContainer | null = null;

export const getContainer = (): AppContainer => {
  if (!activeContainer) {
    activeContainer = createContainer();
  }

  return activeContainer;
};

export const resetContainer = (overrides: ContainerOverrides = {}): AppContainer => {
  activeContainer = createContainer(overrides);
  return activeContainer;
};

export const resolveStreamSession = (): StreamSession => getContainer().session;

export const resolveSubscriptionRegistry = (): SubscriptionRegistry => getContainer().registry;

export const resolveSymbolMarketDirectory = (): SymbolMarketDirectory => getContainer().marketDirectory;

export const resolveVICascadeController = (): VICascadeController => getContainer().viController;

export const resolveOrderEventMonitor = (): OrderEventMonitor | null => getContainer().orderMonitor;

export const resolveHealthService = (): HealthService => getContainer().healthService;
