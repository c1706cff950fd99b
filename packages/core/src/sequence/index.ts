export { ElementSequence } from './element-sequence';
