/**
 * Scroll offset for a list window that must keep `selected` visible.
 * The window only moves when the selection leaves it.
 */
export function scrollOffset(previous: number, selected: number, height: number, total: number): number {
  if (height <= 0 || total <= height) return 0;

  let offset = Math.min(Math.max(previous, 0), total - height);
  if (selected < 0) return offset;
  if (selected < offset) {
    offset = selected;
  } else if (selected >= offset + height) {
    offset = selected - height + 1;
  }
  return offset;
}
