export { CircularBuffer } from './circular-buffer';
