import { readSettings } from "../core/config.js";
import { ConversationCache } from "../core/cache.js";

/**
 * Repair cached conversations: add missing ignore flags, then apply the
 * auto-ignore rule to every record not already ignored.
 */
export function backfillCommand(): void {
  const settings = readSettings();
  const cache = new ConversationCache(settings.conversationsDir, settings.autoIgnorePhrases);

  const flags = cache.backfillIgnoreFlags();
  console.log(`Ignore flags:  checked ${flags.checked}, added ${flags.updated}`);

  const auto = cache.backfillAutoIgnore();
  console.log(`Auto-ignore:   checked ${auto.checked}, newly ignored ${auto.autoIgnored}`);
}
