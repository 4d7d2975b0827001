import type { Channel, Paginated, RoomSummary } from '../shared/types.js';
import type { ChatStore } from './chat-store.js';
import { requireGlobalAdmin } from './access.js';
import { chatError, ChatErrorCode } from '../utils/errors.js';
import { generateId } from '../utils/ids.js';
import { formatChannel, formatRoomSummary } from '../utils/format.js';
import { pageRequest, paginated } from '../utils/pagination.js';

export class ChannelService {
  constructor(private readonly store: ChatStore) {}

  async createChannel(userId: string, input: { name: string; description?: string | null }): Promise<Channel> {
    await requireGlobalAdmin(this.store, userId);
    const name = await this.availableName(input.name);
    const channel = await this.store.createChannel({
      id: generateId(),
      name,
      description: input.description?.trim() || null,
      createdBy: userId,
    });
    return formatChannel(channel, 0);
  }

  async listChannels(): Promise<Channel[]> {
    const rows = await this.store.listChannels();
    return rows.map((c) => formatChannel(c, c.topicCount));
  }

  /** Topics of the channel the caller belongs to. */
  async listTopics(channelId: string, userId: string, page: number, pageSize: number): Promise<Paginated<RoomSummary>> {
    const channel = await this.store.getChannel(channelId);
    if (!channel?.isActive) throw chatError('NOT_FOUND', ChatErrorCode.CHANNEL_NOT_FOUND, 'Channel not found');

    const result = await this.store.listChannelTopicsForUser(channel.id, userId, pageRequest(page, pageSize));
    const items = result.items.map(({ room, membership }) => formatRoomSummary(room, membership));
    return paginated(items, result.total, page, pageSize);
  }

  async updateChannel(
    userId: string,
    channelId: string,
    patch: { name?: string; description?: string | null },
  ): Promise<Channel> {
    await requireGlobalAdmin(this.store, userId);
    const existing = await this.store.getChannel(channelId);
    if (!existing) throw chatError('NOT_FOUND', ChatErrorCode.CHANNEL_NOT_FOUND, 'Channel not found');

    const changes: { name?: string; description?: string | null } = {};
    if (patch.name !== undefined && patch.name.trim() !== existing.name) {
      changes.name = await this.availableName(patch.name);
    }
    if (patch.description !== undefined) changes.description = patch.description?.trim() || null;

    const updated = await this.store.updateChannel(channelId, changes);
    if (!updated) throw chatError('NOT_FOUND', ChatErrorCode.CHANNEL_NOT_FOUND, 'Channel not found');
    return formatChannel(updated);
  }

  async deactivateChannel(userId: string, channelId: string): Promise<{ success: true }> {
    await requireGlobalAdmin(this.store, userId);
    const updated = await this.store.updateChannel(channelId, { isActive: false });
    if (!updated) throw chatError('NOT_FOUND', ChatErrorCode.CHANNEL_NOT_FOUND, 'Channel not found');
    return { success: true };
  }

  private async availableName(raw: string): Promise<string> {
    const name = raw.trim();
    if (!name) throw chatError('BAD_REQUEST', ChatErrorCode.INVALID_ROOM, 'Channel name cannot be empty');
    if (await this.store.findChannelByName(name)) {
      throw chatError('CONFLICT', ChatErrorCode.CHANNEL_EXISTS, 'A channel with this name already exists');
    }
    return name;
  }
}
