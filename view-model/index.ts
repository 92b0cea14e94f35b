export { EditorSession, type EditorSessionOptions, type StatusListener } from './editor-session';
export { computeLineView, clipSpansToLine, type LineView, type LineToken, type LineSelection } from './line-view';
export {
  DARK_THEME, LIGHT_THEME, getTheme, setTheme, onThemeChange, resolveCategoryStyle,
  type EditorTheme, type FontStyle, type CategoryColors,
} from './theme';
