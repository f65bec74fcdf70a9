export interface Notification {
  recipient: string;
  subject: string;
  body: string;
}

/** Delivers one message; a rejected promise means it was not accepted. */
export interface NotificationSink {
  send(notification: Notification): Promise<void>;
}
