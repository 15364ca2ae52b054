import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ZoomClient } from '../providers/zoom/client.js';
import { mcpLogger as logger } from '../utils/logger.js';

// Helper function to format result as MCP content with structured output
function formatResult(data: Record<string, unknown>): CallToolResult {
  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify(data, null, 2)
    }],
    structuredContent: data
  };
}

export interface ZoomTool {
  description: string;
  inputShape: z.ZodRawShape;
  run(input: unknown): Promise<CallToolResult>;
}

function defineTool<S extends z.ZodRawShape>(
  name: string,
  description: string,
  inputShape: S,
  handler: (input: z.objectOutputType<S, z.ZodTypeAny, 'strip'>) => Promise<Record<string, unknown>>
): ZoomTool {
  const inputSchema = z.object(inputShape);
  return {
    description,
    inputShape,
    async run(input) {
      try {
        return formatResult(await handler(inputSchema.parse(input)));
      } catch (error) {
        logger.error({ tool: name, err: error }, `Error in ${name}`);
        throw error;
      }
    }
  };
}

// Input schemas
const MeetingInputShape = {
  name: z.string().min(1).describe('Meeting topic'),
  intro: z.string().optional().describe('Description shown as the agenda; HTML is stripped'),
  isWebinar: z.boolean().optional().default(false).describe('Schedule a webinar instead of a meeting'),
  isRecurring: z.boolean().optional().default(false).describe('Recurring meeting with no fixed time'),
  hostId: z.string().min(1).describe('Zoom user ID or email of the host'),
  startTime: z.number().int().describe('Start time as epoch seconds'),
  durationSeconds: z.number().int().min(0).describe('Length of the meeting in seconds'),
  audioOption: z.enum(['both', 'telephony', 'voip']).optional().default('both').describe('Audio options'),
  hostVideo: z.boolean().optional().default(false).describe('Start video when the host joins'),
  participantVideo: z.boolean().optional().default(false).describe('Start video when participants join'),
  joinBeforeHost: z.boolean().optional().default(false).describe('Allow participants to join before the host'),
  enforceLogin: z.boolean().optional().default(false).describe('Only signed-in users can join'),
  password: z.string().optional().describe('Meeting passcode')
};

const ExistingMeetingInputShape = {
  ...MeetingInputShape,
  meetingId: z.union([z.string(), z.number()]).describe('Zoom meeting or webinar ID')
};

const MeetingRefInputShape = {
  meetingId: z.union([z.string(), z.number()]).describe('Zoom meeting or webinar ID'),
  isWebinar: z.boolean().optional().default(false).describe('Whether the ID refers to a webinar')
};

const UserIdInputShape = {
  userId: z.string().min(1).describe('Zoom user ID or email')
};

const WebinarUuidInputShape = {
  uuid: z.string().min(1).describe('UUID of the webinar session')
};

const ReportDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

// Meetings addressed only by ID still go through the MeetingRecord-based client calls.
function refToRecord(input: { meetingId: string | number; isWebinar: boolean }) {
  return {
    name: String(input.meetingId),
    isWebinar: input.isWebinar,
    isRecurring: false,
    hostId: '',
    startTime: 0,
    durationSeconds: 0,
    audioOption: 'both' as const,
    hostVideo: false,
    participantVideo: false,
    joinBeforeHost: false,
    enforceLogin: false,
    meetingId: input.meetingId
  };
}

// Tool definitions
export function createZoomTools(zoomClient: ZoomClient): Record<string, ZoomTool> {
  return {
    zoom_create_meeting: defineTool(
      'zoom_create_meeting',
      'Create a Zoom meeting or webinar for a host, recycling a paid license to the host when needed',
      MeetingInputShape,
      async (input) => {
        logger.info({ topic: input.name, hostId: input.hostId }, 'Creating Zoom meeting');
        const meeting = await zoomClient.createMeeting(input);
        return {
          id: meeting.id,
          uuid: meeting.uuid,
          type: meeting.type,
          joinUrl: meeting.join_url,
          startUrl: meeting.start_url
        };
      }
    ),

    zoom_update_meeting: defineTool(
      'zoom_update_meeting',
      'Update an existing Zoom meeting or webinar',
      ExistingMeetingInputShape,
      async (input) => {
        logger.info({ meetingId: input.meetingId }, 'Updating Zoom meeting');
        await zoomClient.updateMeeting(input);
        return { success: true, message: `Meeting ${input.meetingId} updated successfully` };
      }
    ),

    zoom_delete_meeting: defineTool(
      'zoom_delete_meeting',
      'Delete a Zoom meeting or webinar',
      MeetingRefInputShape,
      async (input) => {
        logger.info({ meetingId: input.meetingId }, 'Deleting Zoom meeting');
        await zoomClient.deleteMeeting(refToRecord(input));
        return { success: true, message: `Meeting ${input.meetingId} deleted successfully` };
      }
    ),

    zoom_get_meeting: defineTool(
      'zoom_get_meeting',
      'Get detailed information about a Zoom meeting or webinar',
      MeetingRefInputShape,
      async (input) => {
        const meeting = await zoomClient.getMeetingInfo(refToRecord(input));
        return { ...meeting };
      }
    ),

    zoom_autocreate_user: defineTool(
      'zoom_autocreate_user',
      'Create a licensed Zoom user for an LMS user; reports when the email is already on the account',
      {
        email: z.string().email().describe('Email of the new user'),
        firstName: z.string().describe('First name'),
        lastName: z.string().describe('Last name')
      },
      async (input) => {
        const created = await zoomClient.autocreateUser(input);
        return { created, email: input.email };
      }
    ),

    zoom_list_users: defineTool(
      'zoom_list_users',
      'List every user of the Zoom account; loaded once and cached by the connector',
      {},
      async () => {
        const users = await zoomClient.listUsers();
        return { total: users.length, users };
      }
    ),

    zoom_get_user: defineTool(
      'zoom_get_user',
      'Get a Zoom user by ID or email',
      UserIdInputShape,
      async (input) => ({ ...(await zoomClient.getUser(input.userId)) })
    ),

    zoom_set_user_type: defineTool(
      'zoom_set_user_type',
      'Change the license type of a Zoom user (1 = Basic, 2 = Licensed, 3 = On-prem)',
      {
        ...UserIdInputShape,
        type: z.union([z.literal(1), z.literal(2), z.literal(3)]).describe('New user type')
      },
      async (input) => {
        logger.info({ userId: input.userId, type: input.type }, 'Changing Zoom user type');
        await zoomClient.setUserType(input.userId, input.type);
        return { success: true, userId: input.userId, type: input.type };
      }
    ),

    zoom_get_user_by_email: defineTool(
      'zoom_get_user_by_email',
      'Find a Zoom user on the account by email',
      { email: z.string().email().describe('Email to look up') },
      async (input) => {
        const user = await zoomClient.getUserByEmail(input.email);
        return user ? { found: true, user } : { found: false };
      }
    ),

    zoom_get_user_settings: defineTool(
      'zoom_get_user_settings',
      "Get a Zoom user's settings",
      UserIdInputShape,
      async (input) => zoomClient.getUserSettings(input.userId)
    ),

    zoom_get_user_token: defineTool(
      'zoom_get_user_token',
      "Get a Zoom user's ZAK token, used to start meetings on their behalf",
      UserIdInputShape,
      async (input) => ({ token: await zoomClient.getUserToken(input.userId) })
    ),

    zoom_user_report: defineTool(
      'zoom_user_report',
      'List the ended meetings a user hosted in a date range',
      {
        ...UserIdInputShape,
        from: ReportDate.describe('First day of the period (YYYY-MM-DD)'),
        to: ReportDate.describe('Last day of the period (YYYY-MM-DD)')
      },
      async (input) => {
        const meetings = await zoomClient.getUserReport(input.userId, input.from, input.to);
        return { total: meetings.length, meetings };
      }
    ),

    zoom_list_webinar_uuids: defineTool(
      'zoom_list_webinar_uuids',
      'List the UUIDs of all webinars of a user',
      UserIdInputShape,
      async (input) => {
        const uuids = await zoomClient.listWebinarUuids(input.userId);
        return { total: uuids.length, uuids };
      }
    ),

    zoom_list_webinar_attendees: defineTool(
      'zoom_list_webinar_attendees',
      'List the registrants of a webinar session',
      WebinarUuidInputShape,
      async (input) => {
        const registrants = await zoomClient.listWebinarAttendees(input.uuid);
        return { total: registrants.length, registrants };
      }
    ),

    zoom_get_webinar_detail: defineTool(
      'zoom_get_webinar_detail',
      'Get details about a webinar session',
      WebinarUuidInputShape,
      async (input) => {
        const webinar = await zoomClient.getWebinarDetail(input.uuid);
        return { ...webinar };
      }
    )
  };
}
