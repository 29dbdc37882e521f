import type { ActiveTarget, ChannelName, Notification } from "../shared/types.js";

/**
 * One outbound notification transport plus the knobs that shape what
 * gets captured for it.
 */
export interface NotificationChannel {
  name: ChannelName;
  /** Lines captured from the pane before filtering */
  contextLines: number;
  /** Non-empty lines kept for the body */
  maxLines: number;
  /** Body length limit of the transport */
  maxChars: number;
  buildTitle(target: ActiveTarget, cwd: string): string;
  /** Resolves false on any delivery problem; never rejects */
  deliver(notification: Notification): Promise<boolean>;
}
