export interface Notifier {
  /** Resolves true when the endpoint acknowledged the message. Never rejects. */
  send(text: string): Promise<boolean>
}
