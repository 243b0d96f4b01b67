export { MouseProvider } from './MouseProvider';
export { MOUSE_OFF, MOUSE_ON, disableMouse, enableMouse } from './mouseProtocol';
export type { TerminalWrite } from './mouseProtocol';
export { isMouseInput, parseMouseEvents } from './parseMouseEvent';
export type { TerminalMouseEvent } from './parseMouseEvent';
