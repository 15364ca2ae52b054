import { mcpLogger, type Logger } from '../../utils/logger.js';
import { ZoomUserType, type ZoomUser } from './types.js';
import type { UserDirectory } from './user-directory.js';

export interface SeatAccounts {
  getUser(userId: string): Promise<ZoomUser>;
  setUserType(userId: string, type: ZoomUserType): Promise<void>;
}

export type RecycleOutcome =
  | { action: 'host-already-licensed' }
  | { action: 'below-limit'; paidUsers: number }
  | { action: 'no-candidate' }
  | { action: 'recycled'; demotedUserId: string; promotedUserId: string };

export function isPaidUser(user: Pick<ZoomUser, 'type'>): boolean {
  return user.type !== ZoomUserType.Basic;
}

/**
 * Counts paid users, stopping as soon as the limit is hit.
 */
export function paidUserLimitReached(users: Iterable<ZoomUser>, seatLimit: number): boolean {
  let paidUsers = 0;
  for (const user of users) {
    if (isPaidUser(user) && ++paidUsers >= seatLimit) {
      return true;
    }
  }
  return false;
}

/**
 * The paid user with the oldest last login. Users who never logged in are
 * not candidates. Among equal timestamps the first one scanned wins.
 */
export function leastRecentlyActivePaidUser(users: Iterable<ZoomUser>): ZoomUser | undefined {
  let oldest: { user: ZoomUser; loginTime: number } | undefined;
  for (const user of users) {
    if (!isPaidUser(user) || !user.last_login_time) {
      continue;
    }
    const loginTime = Date.parse(user.last_login_time);
    if (Number.isNaN(loginTime)) {
      continue;
    }
    if (!oldest || loginTime < oldest.loginTime) {
      oldest = { user, loginTime };
    }
  }
  return oldest?.user;
}

/**
 * Keeps the number of licensed Zoom users under a seat limit by moving the
 * license of the least recently active paid user to a Basic host who is about
 * to schedule a meeting.
 *
 * Steps are not atomic and are not rolled back: if the promotion fails after a
 * demotion, the seat stays free.
 */
export class LicenseRecycler {
  private readonly logger: Logger;

  constructor(
    private readonly accounts: SeatAccounts,
    private readonly directory: UserDirectory,
    private readonly seatLimit: number,
    logger?: Logger
  ) {
    this.logger = logger ?? mcpLogger;
  }

  async ensureLicense(hostId: string): Promise<RecycleOutcome> {
    const host = await this.accounts.getUser(hostId);
    if (isPaidUser(host)) {
      return { action: 'host-already-licensed' };
    }

    const users = await this.directory.list();
    if (!paidUserLimitReached(users, this.seatLimit)) {
      return { action: 'below-limit', paidUsers: users.filter(isPaidUser).length };
    }

    const victim = leastRecentlyActivePaidUser(users);
    if (!victim) {
      this.logger.warn(
        { hostId, seatLimit: this.seatLimit },
        'Paid seat limit reached but no paid user has a recorded last login; leaving licenses unchanged'
      );
      return { action: 'no-candidate' };
    }

    await this.accounts.setUserType(victim.id, ZoomUserType.Basic);
    this.logger.info({ userId: victim.id, lastLogin: victim.last_login_time }, 'Demoted least recently active paid user');

    await this.accounts.setUserType(hostId, ZoomUserType.Licensed);
    this.logger.info({ userId: hostId }, 'Promoted meeting host to licensed');

    return { action: 'recycled', demotedUserId: victim.id, promotedUserId: hostId };
  }
}
