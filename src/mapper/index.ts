export { BaseMapper, type Mapper, mapperName } from './base.js';
