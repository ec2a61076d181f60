/** Button presses, releases and wheel steps, reported in SGR form. */
export const ENABLE_MOUSE = '\u001b[?1000h\u001b[?1006h';
export const DISABLE_MOUSE = '\u001b[?1000l\u001b[?1006l';
export const CLEAR_SCREEN = '\u001b[2J\u001b[H';
