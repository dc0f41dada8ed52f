/**
 * Encoding, descriptor and validation utilities.
 * @packageDocumentation
 */

export { parseEncoding } from './parser'
export { encodeMachine, prettyPrintMachine } from './encoder'
export { verifyMachine, validateEncoding, isValidEncoding } from './validator'
export {
  MachineDescriptorSchema,
  descriptorToComponents,
  componentsToDescriptor,
  type MachineDescriptor,
  type NormalizedMachineDescriptor,
} from './descriptor'
