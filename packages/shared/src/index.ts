export * from './types';
export { HEADERS, MIRROR_CONTINUATION_MARKER } from './constants';
