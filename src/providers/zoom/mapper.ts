import { ZoomMeetingType, type MeetingRecord, type ZoomMeetingRequest } from './types.js';

export function stripTags(html: string): string {
  return html.replace(/<[^>]*>/g, '');
}

export function localTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/** Zoom wants second precision with a literal Z suffix. */
export function formatStartTime(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function meetingTypeOf(meeting: Pick<MeetingRecord, 'isWebinar' | 'isRecurring'>): ZoomMeetingType {
  if (meeting.isWebinar) {
    return meeting.isRecurring ? ZoomMeetingType.RecurringWebinar : ZoomMeetingType.ScheduledWebinar;
  }
  return meeting.isRecurring ? ZoomMeetingType.RecurringMeeting : ZoomMeetingType.ScheduledMeeting;
}

/**
 * Converts a stored meeting into the body of a Zoom create/update meeting or webinar request.
 *
 * @param timezone - Site timezone. When empty the server's own timezone is sent.
 */
export function toApiPayload(meeting: MeetingRecord, timezone?: string): ZoomMeetingRequest {
  const type = meetingTypeOf(meeting);
  const payload: ZoomMeetingRequest = {
    topic: meeting.name,
    type,
    timezone: timezone || localTimezone(),
    settings: {
      host_video: meeting.hostVideo,
      audio: meeting.audioOption,
      enforce_login: meeting.enforceLogin
    }
  };

  if (meeting.intro !== undefined) {
    payload.agenda = stripTags(meeting.intro);
  }
  if (meeting.password !== undefined) {
    payload.password = meeting.password;
  }

  if (!meeting.isWebinar) {
    payload.settings.join_before_host = meeting.joinBeforeHost;
    payload.settings.participant_video = meeting.participantVideo;
  }

  // Recurring meetings without a fixed time carry neither a start nor a length.
  if (type === ZoomMeetingType.ScheduledMeeting || type === ZoomMeetingType.ScheduledWebinar) {
    payload.start_time = formatStartTime(meeting.startTime);
    payload.duration = Math.ceil(meeting.durationSeconds / 60);
  }

  return payload;
}
