/**
 * Events module: event names and the typed mapper event emitter.
 */

export {
  type MapperAmbiguousPayload,
  MapperEventEmitter,
  type MapperEventMap,
  type MapperNotFoundPayload,
  type MapperRegisteredPayload,
  type MapperResolvedPayload,
} from './event-emitter.js';
export { type MapperEventName, MapperEventNames } from './event-names.js';
