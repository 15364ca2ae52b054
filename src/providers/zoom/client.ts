import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { ZOOM_API_URL, ZOOM_MAX_RECORDS_PER_CALL, type AppConfig } from '../../config/index.js';
import { mcpLogger as defaultLogger, type Logger } from '../../utils/logger.js';
import { ConfigurationError, isUserAlreadyExistsError, isUserNotFoundError, ZoomError } from './errors.js';
import { LicenseRecycler, type SeatAccounts } from './license-recycler.js';
import { toApiPayload } from './mapper.js';
import { ZoomPaginator } from './paginator.js';
import { parseResponse, ZoomRequestExecutor } from './request.js';
import { AxiosTransport, type Transport } from './transport.js';
import {
  zoomMeetingSchema,
  zoomRegistrantSchema,
  zoomReportMeetingSchema,
  zoomUserSchema,
  zoomUserSettingsSchema,
  zoomUserTokenSchema,
  zoomWebinarSummarySchema,
  ZoomUserType,
  type LicensePolicy,
  type LmsUser,
  type MeetingRecord,
  type ZoomCredentials,
  type ZoomMeeting,
  type ZoomRegistrant,
  type ZoomReportMeeting,
  type ZoomUser,
  type ZoomUserSettings
} from './types.js';
import { UserDirectory } from './user-directory.js';

export interface ZoomClientOptions {
  credentials: Partial<ZoomCredentials>;
  licensePolicy?: Partial<LicensePolicy>;
  baseUrl?: string;
  /** Site timezone sent with every meeting; the server's timezone when empty. */
  timezone?: string;
  maxRecordsPerCall?: number;
  transport?: Transport;
  logger?: Logger;
  /** Epoch seconds used to date the signed tokens. */
  clock?: () => number;
}

const clientSettingsSchema = z
  .object({
    credentials: z.object({
      key: z.string({ required_error: 'Zoom API key is missing' }).trim().min(1, 'Zoom API key is missing'),
      secret: z.string({ required_error: 'Zoom API secret is missing' }).trim().min(1, 'Zoom API secret is missing')
    }),
    licensePolicy: z
      .object({
        enabled: z.boolean().default(false),
        seatLimit: z.number().optional()
      })
      .default({}),
    baseUrl: z.string().url().default(ZOOM_API_URL),
    timezone: z.string().optional(),
    maxRecordsPerCall: z.number().int().min(1).max(ZOOM_MAX_RECORDS_PER_CALL).default(ZOOM_MAX_RECORDS_PER_CALL)
  })
  .superRefine((settings, ctx) => {
    const { enabled, seatLimit } = settings.licensePolicy;
    if (enabled && (seatLimit === undefined || !Number.isInteger(seatLimit) || seatLimit < 1)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['licensePolicy', 'seatLimit'],
        message: 'Number of licenses is required when license recycling is enabled'
      });
    }
  });

export function clientOptionsFromConfig(config: AppConfig): ZoomClientOptions {
  return {
    credentials: { key: config.zoom.apiKey, secret: config.zoom.apiSecret },
    licensePolicy: { enabled: config.zoom.recycleLicenses, seatLimit: config.zoom.licensesCount },
    baseUrl: config.zoom.baseUrl,
    timezone: config.zoom.timezone,
    maxRecordsPerCall: config.zoom.maxRecordsPerCall
  };
}

/**
 * Zoom REST API client used by the LMS plugin: users, meetings, webinars and reports.
 */
export class ZoomClient implements SeatAccounts {
  private readonly executor: ZoomRequestExecutor;
  private readonly paginator: ZoomPaginator;
  private readonly directory: UserDirectory;
  private readonly recycler: LicenseRecycler | null;
  // Tail of the queue of recycling steps; one runs at a time per client.
  private recycling: Promise<void> = Promise.resolve();
  private readonly timezone?: string;
  private readonly logger: Logger;

  constructor(options: ZoomClientOptions) {
    const parsed = clientSettingsSchema.safeParse(options);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(issue ? issue.message : 'Invalid Zoom client settings', { cause: parsed.error });
    }
    const settings = parsed.data;

    this.logger = options.logger ?? defaultLogger;
    this.timezone = settings.timezone;
    this.executor = new ZoomRequestExecutor({
      credentials: settings.credentials,
      baseUrl: settings.baseUrl,
      transport: options.transport ?? new AxiosTransport(),
      logger: this.logger,
      clock: options.clock
    });
    this.paginator = new ZoomPaginator(this.executor, settings.maxRecordsPerCall);
    this.directory = new UserDirectory(this.paginator);

    const { enabled, seatLimit } = settings.licensePolicy;
    this.recycler =
      enabled && seatLimit !== undefined
        ? new LicenseRecycler(this, this.directory, seatLimit, this.logger)
        : null;
  }

  async listUsers(): Promise<ZoomUser[]> {
    return this.directory.list();
  }

  /**
   * Creates a licensed Zoom user for an LMS user.
   *
   * @returns false when the email is already taken on the account
   */
  async autocreateUser(user: LmsUser): Promise<boolean> {
    const data = {
      action: 'autocreate',
      user_info: {
        email: user.email,
        type: ZoomUserType.Licensed,
        first_name: user.firstName,
        last_name: user.lastName,
        password: randomBytes(16).toString('base64')
      }
    };

    try {
      await this.executor.call('users', data, 'POST');
    } catch (error) {
      if (isUserAlreadyExistsError(error)) {
        return false;
      }
      throw error;
    }

    this.logger.info({ email: user.email }, 'Created Zoom user');
    return true;
  }

  async getUser(userId: string): Promise<ZoomUser> {
    const path = `users/${encodeURIComponent(userId)}`;
    return parseResponse(zoomUserSchema, await this.executor.call(path), path);
  }

  async getUserSettings(userId: string): Promise<ZoomUserSettings> {
    const path = `users/${encodeURIComponent(userId)}/settings`;
    return parseResponse(zoomUserSettingsSchema, await this.executor.call(path), path);
  }

  /**
   * @returns null when no user with this email belongs to the account
   */
  async getUserByEmail(email: string): Promise<ZoomUser | null> {
    try {
      return await this.getUser(email);
    } catch (error) {
      if (isUserNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }

  async setUserType(userId: string, type: ZoomUserType): Promise<void> {
    await this.executor.call(`users/${encodeURIComponent(userId)}`, { type }, 'PATCH');
    this.directory.recordTypeChange(userId, type);
  }

  async getUserToken(userId: string): Promise<string> {
    const path = `users/${encodeURIComponent(userId)}/token`;
    return parseResponse(zoomUserTokenSchema, await this.executor.call(path), path).token;
  }

  /**
   * Schedules the meeting or webinar on Zoom. With license recycling on, a
   * Basic host first receives a license, taken from the least recently active
   * paid user when the seat limit is reached.
   */
  async createMeeting(meeting: MeetingRecord): Promise<ZoomMeeting> {
    if (this.recycler) {
      const recycler = this.recycler;
      const outcome = await this.exclusively(() => recycler.ensureLicense(meeting.hostId));
      this.logger.info({ hostId: meeting.hostId, ...outcome }, 'License check before meeting creation');
    }

    const path = `users/${encodeURIComponent(meeting.hostId)}/${meeting.isWebinar ? 'webinars' : 'meetings'}`;
    const created = parseResponse(
      zoomMeetingSchema,
      await this.executor.call(path, { ...toApiPayload(meeting, this.timezone) }, 'POST'),
      path
    );
    this.logger.info({ meetingId: created.id, hostId: meeting.hostId, webinar: meeting.isWebinar }, 'Created Zoom meeting');
    return created;
  }

  /**
   * Runs a seat check and its patches after every earlier one has settled, so
   * concurrent callers never count seats against the same stale snapshot.
   */
  private exclusively<T>(task: () => Promise<T>): Promise<T> {
    const run = this.recycling.then(task);
    // The queue only waits for settlement; the failure itself reaches the caller through run.
    this.recycling = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async updateMeeting(meeting: MeetingRecord): Promise<void> {
    await this.executor.call(meetingPath(meeting), { ...toApiPayload(meeting, this.timezone) }, 'PATCH');
  }

  async deleteMeeting(meeting: MeetingRecord): Promise<void> {
    await this.executor.call(meetingPath(meeting), null, 'DELETE');
  }

  async getMeetingInfo(meeting: MeetingRecord): Promise<ZoomMeeting> {
    const path = meetingPath(meeting);
    return parseResponse(zoomMeetingSchema, await this.executor.call(path), path);
  }

  /**
   * Ended meetings hosted by a user between two dates (YYYY-MM-DD).
   */
  async getUserReport(userId: string, from: string, to: string): Promise<ZoomReportMeeting[]> {
    return this.paginator.paginatedCall(
      `report/users/${encodeURIComponent(userId)}/meetings`,
      { from, to },
      'meetings',
      zoomReportMeetingSchema
    );
  }

  async listWebinarUuids(userId: string): Promise<string[]> {
    const webinars = await this.paginator.paginatedCall(
      `users/${encodeURIComponent(userId)}/webinars`,
      null,
      'webinars',
      zoomWebinarSummarySchema
    );
    return webinars.map((webinar) => webinar.uuid);
  }

  /**
   * Registrants of one webinar session.
   */
  async listWebinarAttendees(uuid: string): Promise<ZoomRegistrant[]> {
    return this.paginator.paginatedCall(`webinars/${encodeUuid(uuid)}/registrants`, null, 'registrants', zoomRegistrantSchema);
  }

  async getWebinarDetail(uuid: string): Promise<ZoomMeeting> {
    const path = `webinars/${encodeUuid(uuid)}`;
    return parseResponse(zoomMeetingSchema, await this.executor.call(path), path);
  }
}

function meetingPath(meeting: MeetingRecord): string {
  if (meeting.meetingId === undefined || meeting.meetingId === '') {
    throw new ZoomError(`Meeting "${meeting.name}" has no Zoom meeting id`);
  }
  return `${meeting.isWebinar ? 'webinars' : 'meetings'}/${encodeURIComponent(String(meeting.meetingId))}`;
}

// Zoom requires UUIDs that start with "/" or contain "//" to be encoded twice.
export function encodeUuid(uuid: string): string {
  const encoded = encodeURIComponent(uuid);
  return uuid.startsWith('/') || uuid.includes('//') ? encodeURIComponent(encoded) : encoded;
}
