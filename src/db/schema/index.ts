export * from './users.js';
export * from './channels.js';
export * from './rooms.js';
export * from './room-members.js';
export * from './messages.js';
export * from './attachments.js';
export * from './mentions.js';
export * from './reactions.js';
export * from './read-receipts.js';
export * from './push-subscriptions.js';
