export { DescriptorRegistry, defaultDescriptorRegistry } from './descriptor-registry.js';
