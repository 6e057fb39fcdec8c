export { discoverFiles, type DiscoveryOptions } from './file-finder.js';
