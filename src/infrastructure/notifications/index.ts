export { GoogleChatNotifier } from './google-chat.js';
