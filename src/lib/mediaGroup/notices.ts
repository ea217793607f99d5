// Chat notice templates for media-group processing.

export const COLLECTING_NOTICE = "⏳ Collecting media group, please wait...";

export const NOTHING_TO_PROCESS_NOTICE = "❌ Nothing to process in this media group";

export function progressNotice(index: number, total: number): string {
  return `⏳ Saving media group: ${index}/${total}`;
}

export function doneNotice(
  processed: number,
  total: number,
  elapsedSeconds: string,
): string {
  return `✅ Media group saved: ${processed}/${total} items, elapsed ${elapsedSeconds}s`;
}
