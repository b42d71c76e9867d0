export { compressHostlist, expandHostlist, DEFAULT_MAX_HOSTS, type ExpandOptions } from './hostlist';
export { resolveSelector, type NodeSelector } from './selector';
