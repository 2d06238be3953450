export { WorkQueue, DEFAULT_BASE_DELAY_MS, DEFAULT_MAX_DELAY_MS, MAX_TIMER_DELAY_MS, type QueueHandler, type WorkQueueOptions } from './work-queue.js';
