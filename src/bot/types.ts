/**
 * Where the queue reports back to: the chat and the status message
 * created when the request was accepted
 */
export interface ChatTarget {
  chatId: number;
  statusMessageId?: number;
}

/**
 * The parts of an incoming Telegram text message the services use
 */
export interface IncomingMessage {
  chatId: number;
  userId: number;
  displayName: string;
  text: string;
}
