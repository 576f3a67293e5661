const DELIVERY_STATUSES = [
    'initiated',
    'ringing',
    'answered',
    'completed',
    'busy',
    'no-answer',
    'failed',
    'canceled'
] as const;
export type DeliveryStatus = typeof DELIVERY_STATUSES[number];

export const CALL_ENDED_STATUSES: ReadonlySet<DeliveryStatus> = new Set<DeliveryStatus>([
    'completed',
    'busy',
    'no-answer',
    'failed',
    'canceled'
]);

export type AnswerEvent =
    | { kind: 'answered'; callRef: string; from?: string }
    | { kind: 'timeout'; callRef: string; from?: string }
    | { kind: 'digit-input'; callRef: string; digits: string; from?: string }
    | { kind: 'speech-input'; callRef: string; utterance: string; from?: string };

export interface StatusEvent {
    kind: DeliveryStatus;
    callRef: string;
}

export interface PlaceCallRequest {
    to: string;
    answerUrl: string;
    statusCallbackUrl: string;
}

export interface TelephonyGateway {
    /** Resolves with the provider's call reference. */
    placeCall(request: PlaceCallRequest): Promise<string>;
}

export interface ConversationExchange {
    utterance: string;
    reply: string;
}

export interface ReplyContext {
    callRef: string;
    history: ConversationExchange[];
}

export interface ScriptGenerator {
    generateReminderScript(patientName: string, appointmentTime: string, customMessage: string | null): Promise<string>;
    generateFreeformReply(utterance: string, context: ReplyContext): Promise<string>;
}
