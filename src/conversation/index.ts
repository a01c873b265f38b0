export { ConversationStore, createConversationStore } from './conversation-store';
