export { Packet, headerFromFlags } from './packet'
export type { PacketHeader } from './packet'
export {
  RECORD_CLASSES,
  RECORD_TYPES,
  STRING_RECORD_TYPES,
  createResourceRecord,
  formatRecordData,
  formatResourceRecord,
} from './resource-record'
export type {
  MxData,
  RecordClass,
  RecordType,
  ResourceRecord,
  ResourceRecordInit,
  SrvData,
  StringRecordType,
} from './resource-record'
export { encodePacket, decodePacket } from './codec'
export { canonicalName, normalizeName } from './name'
