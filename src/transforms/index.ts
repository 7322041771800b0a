export type { TransformFunction, TransformFactory, CompiledTransform } from './types'
export {
  TransformRegistry,
  createDefaultTransformRegistry,
  defaultTransformRegistry,
  registerTransform,
} from './registry'
export {
  dateFormatTransform,
  tokenizeFormat,
  compileDateParser,
  compileDateFormatter,
  isValidDate,
} from './date-format'
export { multiplyTransform } from './multiply'
export { phoneTransform } from './phone'
