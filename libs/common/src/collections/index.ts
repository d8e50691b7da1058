export { KeyedStore } from './keyed-store';
export { RingBuffer, mean } from './ring-buffer';
