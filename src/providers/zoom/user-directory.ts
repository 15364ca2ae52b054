import type { ZoomPaginator } from './paginator.js';
import { zoomUserSchema, type ZoomUser } from './types.js';

/**
 * Every user of the Zoom account, fetched once per client.
 * There is no refresh: build a new client to see upstream changes.
 */
export class UserDirectory {
  private users: Map<string, ZoomUser> | null = null;
  private loading: Promise<Map<string, ZoomUser>> | null = null;

  constructor(private readonly paginator: ZoomPaginator) {}

  async list(): Promise<ZoomUser[]> {
    const users = await this.load();
    return [...users.values()];
  }

  /**
   * Records a type change the client made itself, so later seat counts
   * from this instance see it.
   */
  recordTypeChange(userId: string, type: number): void {
    const user = this.users?.get(userId);
    if (user) {
      this.users?.set(userId, { ...user, type });
    }
  }

  // Callers arriving while the first fetch is in flight share it.
  private load(): Promise<Map<string, ZoomUser>> {
    if (this.users) {
      return Promise.resolve(this.users);
    }
    if (!this.loading) {
      this.loading = this.fetch().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async fetch(): Promise<Map<string, ZoomUser>> {
    const users = await this.paginator.paginatedCall('users', null, 'users', zoomUserSchema);
    this.users = new Map(users.map((user) => [user.id, user]));
    return this.users;
  }
}
