import dayjs from 'dayjs';
import timezone from 'dayjs/plugin/timezone.js';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(utc);
dayjs.extend(timezone);

export const CONFIRMATION_PROMPT = 'Press 1 to confirm your appointment, or press 2 to speak with our staff.';
export const INVALID_SELECTION_PREFIX = "I'm sorry, I didn't understand your selection.";
export const NO_INPUT_PREFIX = "I didn't receive your input. Let me repeat.";
export const CONFIRMED_CLOSING = 'Thank you for confirming your appointment. We look forward to seeing you. Goodbye!';
export const TRANSFER_NOTICE = "I'll connect you with our office staff. Please hold.";
export const TRANSFER_UNAVAILABLE =
    'Our staff are not available right now. Please call our main office number directly. Goodbye!';
export const NO_RESPONSE_CLOSING =
    'Thank you for your time. If you need to make any changes to your appointment, please call our office during business hours. Goodbye!';

export const INQUIRY_FOLLOW_UP = 'Is there anything else I can help you with?';
export const INQUIRY_NO_INPUT_PREFIX = "I didn't hear anything.";
export const INQUIRY_NO_INPUT_CLOSING = "I didn't receive any input. Please call back when you're ready. Goodbye!";
export const APOLOGY_CLOSING = "I'm sorry, there was an error processing your request. Please try again later.";

export function inquiryGreeting(practiceName: string): string {
    return `Thank you for calling ${practiceName}. I'm the automated assistant. How can I help you today?`;
}

export function formatAppointmentTime(appointmentTime: Date, zone: string): string {
    return dayjs(appointmentTime).tz(zone).format('dddd, MMMM D [at] h:mm A');
}

/** Spoken when the generation service cannot produce a reminder script. */
export function fallbackReminderScript(
    patientName: string,
    spokenTime: string,
    practiceName: string,
    customMessage: string | null
): string {
    const base = `Hello ${patientName}, this is ${practiceName} calling to remind you of your appointment on ${spokenTime}.`;
    return customMessage ? `${base} ${customMessage}` : base;
}
