export { App, paneTitle } from "./App";
export { BookmarkPrompt } from "./BookmarkPrompt";
export { Footer, footerHints } from "./Footer";
export { HelpOverlay } from "./HelpOverlay";
export { PreviewPane } from "./PreviewPane";
export { SearchBar, matchCounter } from "./SearchBar";
export { TreePane } from "./TreePane";
