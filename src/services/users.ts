import type { Paginated, PublicUser } from '../shared/types.js';
import type { ChatStore } from './chat-store.js';
import { requireUser } from './access.js';
import { chatError, ChatErrorCode } from '../utils/errors.js';
import { formatUser } from '../utils/format.js';
import { pageRequest, paginated } from '../utils/pagination.js';

export interface UserListOptions {
  search?: string;
  /** Leave out to list everyone; false lists only people a direct room can be opened with. */
  includeBots?: boolean;
}

export class UserService {
  constructor(private readonly store: ChatStore) {}

  /** Active users other than the caller, ordered by email. */
  async listUsers(userId: string, opts: UserListOptions, page: number, pageSize: number): Promise<Paginated<PublicUser>> {
    const search = opts.search?.trim() || undefined;
    const result = await this.store.listUsers(
      { excludeUserId: userId, search, includeBots: opts.includeBots ?? true },
      pageRequest(page, pageSize),
    );
    return paginated(result.items.map(formatUser), result.total, page, pageSize);
  }

  async updateProfile(userId: string, patch: { displayName?: string | null }): Promise<PublicUser> {
    const user = await requireUser(this.store, userId);
    const changes: { displayName?: string | null } = {};
    if (patch.displayName !== undefined) changes.displayName = patch.displayName?.trim() || null;

    const updated = await this.store.updateUser(user.id, changes);
    if (!updated) throw chatError('NOT_FOUND', ChatErrorCode.USER_NOT_FOUND, 'User not found');
    console.log(`[users] ${updated.username} updated their profile`);
    return formatUser(updated);
  }
}
