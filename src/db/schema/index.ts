export { diagrams } from './diagrams.js'
export { moderationLogs } from './moderation-logs.js'
