export { Clock, ClockSource, getGlobalClockSource, resetClocks } from './clock.js';
