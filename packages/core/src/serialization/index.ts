export { TreeCodec, createTreeCodec, type TreeCodecOptions } from './TreeCodec.js';
