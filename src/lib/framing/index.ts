export { FRAMING_CONSTANTS } from './constants.js';
export { FrameDecoder, encodeFrame } from './frame-codec.js';
export { JsonSocket } from './json-socket.js';
