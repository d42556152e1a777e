import { log } from "@decay-market/sdk";
import type { UserNotifier } from "./types";

/**
 * Text-mode user surface: every notification is logged and kept in order.
 */
export class ConsoleNotifier implements UserNotifier {
  readonly notifications: string[] = [];

  notifyUser(text: string): void {
    this.notifications.push(text);
    log("info", `[seller] ${text}`);
  }
}
