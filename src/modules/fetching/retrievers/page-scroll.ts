/**
 * The part of a rendered page lazy-loading lists need to be driven
 */
export interface ScrollablePage {
  scrollHeight(): Promise<number>;
  scrollToBottom(): Promise<void>;
  pause(ms: number): Promise<void>;
}

/**
 * Scroll to the bottom until the document stops growing, at most
 * `maxScrolls` times. Returns the number of scrolls performed.
 */
export async function scrollUntilStable(
  target: ScrollablePage,
  maxScrolls: number,
  pauseMs: number,
): Promise<number> {
  let height = await target.scrollHeight();
  let scrolls = 0;

  while (scrolls < maxScrolls) {
    await target.scrollToBottom();
    scrolls++;
    await target.pause(pauseMs);

    const next = await target.scrollHeight();
    if (next <= height) {
      break;
    }
    height = next;
  }
  return scrolls;
}
