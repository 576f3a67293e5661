export * from './errors.js';
export * from './types/reminder.js';
export * from './types/calls.js';
export * from './clients/TwilioClient.js';
export * from './clients/OpenAIClient.js';
export * from './clients/RedisClient.js';
export * from './repositories/ReminderStore.js';
export * from './repositories/InMemoryReminderStore.js';
export * from './repositories/RedisReminderStore.js';
export * from './services/VoiceAgentService.js';
export * from './utils/KeyedLock.js';
export * from './utils/phone.js';
export * from './utils/timeout.js';
