import { z } from 'zod';

export const ZoomUserType = {
  Basic: 1,
  Licensed: 2,
  OnPrem: 3
} as const;

export type ZoomUserType = (typeof ZoomUserType)[keyof typeof ZoomUserType];

export const ZoomMeetingType = {
  ScheduledMeeting: 2,
  RecurringMeeting: 3,
  ScheduledWebinar: 5,
  RecurringWebinar: 6
} as const;

export type ZoomMeetingType = (typeof ZoomMeetingType)[keyof typeof ZoomMeetingType];

export type ZoomAudioOption = 'both' | 'telephony' | 'voip';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export type RequestData = Record<string, unknown>;

export const zoomUserSchema = z
  .object({
    id: z.string(),
    email: z.string(),
    type: z.number(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
    status: z.string().optional(),
    timezone: z.string().optional(),
    created_at: z.string().optional(),
    last_login_time: z.string().optional(),
    last_client_version: z.string().optional(),
    pmi: z.number().optional(),
    dept: z.string().optional()
  })
  .passthrough();

export type ZoomUser = z.infer<typeof zoomUserSchema>;

export const zoomUserSettingsSchema = z.record(z.unknown());

export type ZoomUserSettings = z.infer<typeof zoomUserSettingsSchema>;

export const zoomUserTokenSchema = z.object({ token: z.string() }).passthrough();

/**
 * Meeting as the plugin stores it. Built by the caller for each operation.
 */
export interface MeetingRecord {
  name: string;
  intro?: string;
  isWebinar: boolean;
  isRecurring: boolean;
  hostId: string;
  /** Epoch seconds. */
  startTime: number;
  durationSeconds: number;
  audioOption: ZoomAudioOption;
  hostVideo: boolean;
  participantVideo: boolean;
  joinBeforeHost: boolean;
  enforceLogin: boolean;
  password?: string;
  /** Assigned by Zoom once the meeting exists. */
  meetingId?: string | number;
}

export interface ZoomMeetingSettings {
  host_video: boolean;
  audio: ZoomAudioOption;
  enforce_login: boolean;
  join_before_host?: boolean;
  participant_video?: boolean;
}

export interface ZoomMeetingRequest {
  topic: string;
  type: ZoomMeetingType;
  timezone: string;
  agenda?: string;
  password?: string;
  start_time?: string; // UTC, e.g. 2025-02-10T14:00:00Z
  duration?: number; // minutes
  settings: ZoomMeetingSettings;
}

export const zoomMeetingSchema = z
  .object({
    id: z.number(),
    uuid: z.string().optional(),
    host_id: z.string().optional(),
    topic: z.string().optional(),
    type: z.number().optional(),
    start_time: z.string().optional(),
    duration: z.number().optional(),
    timezone: z.string().optional(),
    agenda: z.string().optional(),
    join_url: z.string().optional(),
    start_url: z.string().optional(),
    password: z.string().optional(),
    created_at: z.string().optional()
  })
  .passthrough();

export type ZoomMeeting = z.infer<typeof zoomMeetingSchema>;

export const zoomReportMeetingSchema = z
  .object({
    uuid: z.string(),
    id: z.number(),
    host_id: z.string().optional(),
    type: z.number().optional(),
    topic: z.string().optional(),
    user_name: z.string().optional(),
    user_email: z.string().optional(),
    start_time: z.string().optional(),
    end_time: z.string().optional(),
    duration: z.number().optional(),
    total_minutes: z.number().optional(),
    participants_count: z.number().optional()
  })
  .passthrough();

export type ZoomReportMeeting = z.infer<typeof zoomReportMeetingSchema>;

export const zoomWebinarSummarySchema = z
  .object({
    uuid: z.string(),
    id: z.number(),
    host_id: z.string().optional(),
    topic: z.string().optional(),
    type: z.number().optional(),
    start_time: z.string().optional(),
    duration: z.number().optional()
  })
  .passthrough();

export const zoomRegistrantSchema = z
  .object({
    id: z.string().optional(),
    email: z.string(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
    status: z.string().optional(),
    create_time: z.string().optional(),
    join_url: z.string().optional()
  })
  .passthrough();

export type ZoomRegistrant = z.infer<typeof zoomRegistrantSchema>;

export const zoomPageSchema = z
  .object({
    page_count: z.number().optional(),
    page_number: z.number().optional(),
    page_size: z.number().optional(),
    total_records: z.number().optional(),
    next_page_token: z.string().optional()
  })
  .passthrough();

/**
 * Plugin-side user to provision on Zoom.
 */
export interface LmsUser {
  email: string;
  firstName: string;
  lastName: string;
}

export interface LicensePolicy {
  enabled: boolean;
  seatLimit?: number;
}

export interface ZoomCredentials {
  key: string;
  secret: string;
}
