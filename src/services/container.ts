import type { Config } from '../config/index.js';
import type { ChatStore } from './chat-store.js';
import { PresenceRegistry } from './presence.js';
import { InProcessTaskQueue, type ITaskQueue } from './task-queue.js';
import { HttpPushGateway, LogPushGateway, NotificationService, type IPushGateway } from './notifications.js';
import { UnreadAccounting } from './unread.js';
import { AgentBridge, HttpAgentRunner, UnconfiguredAgentRunner, type IAgentRunner } from './agent-bridge.js';
import { MessageService } from './messages.js';
import { ReadStateService } from './read-state.js';
import { ReactionService } from './reactions.js';
import { RoomService } from './rooms.js';
import { ChannelService } from './channels.js';
import { UserService } from './users.js';
import { LocalFileStorage, type IFileStorage } from './file-storage.js';
import { MemoryEventDispatcher, type IEventDispatcher } from '../ws/event-dispatcher.js';
import { TypingThrottle, type ITypingThrottle } from '../ws/typing-throttle.js';

export interface ServiceOverrides {
  eventDispatcher?: IEventDispatcher;
  taskQueue?: ITaskQueue;
  pushGateway?: IPushGateway;
  agentRunner?: IAgentRunner;
  typingThrottle?: ITypingThrottle;
  fileStorage?: IFileStorage;
}

export interface AppServices {
  store: ChatStore;
  dispatcher: IEventDispatcher;
  presence: PresenceRegistry;
  tasks: ITaskQueue;
  notifications: NotificationService;
  unread: UnreadAccounting;
  agents: AgentBridge;
  messages: MessageService;
  readState: ReadStateService;
  reactions: ReactionService;
  rooms: RoomService;
  channels: ChannelService;
  users: UserService;
  typing: ITypingThrottle;
  fileStorage: IFileStorage;
}

type ServiceConfig = Pick<
  Config,
  'AGENT_RUNNER_URL' | 'AGENT_TIMEOUT_MS' | 'PUSH_GATEWAY_URL' | 'PUSH_GATEWAY_KEY' | 'UPLOAD_DIR' | 'PUBLIC_URL'
>;

/**
 * Wire every service for one process. In-memory and log-only defaults are
 * used unless the config names an external service or an override is given.
 */
export function createServices(store: ChatStore, cfg: ServiceConfig, overrides: ServiceOverrides = {}): AppServices {
  const dispatcher = overrides.eventDispatcher ?? new MemoryEventDispatcher();
  const tasks = overrides.taskQueue ?? new InProcessTaskQueue();
  const presence = new PresenceRegistry({ store, dispatcher });

  const pushGateway =
    overrides.pushGateway ??
    (cfg.PUSH_GATEWAY_URL ? new HttpPushGateway(cfg.PUSH_GATEWAY_URL, cfg.PUSH_GATEWAY_KEY) : new LogPushGateway());
  const agentRunner =
    overrides.agentRunner ??
    (cfg.AGENT_RUNNER_URL ? new HttpAgentRunner(cfg.AGENT_RUNNER_URL, cfg.AGENT_TIMEOUT_MS) : new UnconfiguredAgentRunner());

  const notifications = new NotificationService(store, pushGateway);
  const unread = new UnreadAccounting({ store, presence, notifications, dispatcher });
  const agents = new AgentBridge(agentRunner, dispatcher);

  return {
    store,
    dispatcher,
    presence,
    tasks,
    notifications,
    unread,
    agents,
    messages: new MessageService({ store, presence, dispatcher, tasks, unread, agents }),
    readState: new ReadStateService(store, dispatcher),
    reactions: new ReactionService(store, dispatcher),
    rooms: new RoomService({ store, presence, dispatcher }),
    channels: new ChannelService(store),
    users: new UserService(store),
    typing: overrides.typingThrottle ?? new TypingThrottle(),
    fileStorage: overrides.fileStorage ?? new LocalFileStorage(cfg.UPLOAD_DIR, cfg.PUBLIC_URL),
  };
}
