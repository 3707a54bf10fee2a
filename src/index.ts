export type * from './domain/types/Telegram'
export { ByteReservoir } from './domain/vbus/ByteReservoir'
export { FrameSynchronizer } from './domain/vbus/FrameSynchronizer'
export type { SyncEvent } from './domain/vbus/FrameSynchronizer'
export { vbusChecksum, hasValidChecksum } from './domain/vbus/checksum'
export { decodeSeptetGroup, encodeSeptetGroup } from './domain/vbus/septet'
export { encodePacket, encodeDatagram, encodeTelegram } from './domain/vbus/frameEncoder'
export type { PacketInit, DatagramInit, TelegramInit } from './domain/vbus/frameEncoder'
export { SYNC_BYTE, PROTOCOL, FRAME_LAYOUTS } from './domain/vbus/types'
export {
  TruncatedError,
  SinkWriteError,
  SchemaViolationError,
  SpecificationError,
} from './domain/vbus/errors'
export {
  SpecificationTable,
  loadSpecificationFile,
  loadBuiltinSpecification,
  BUILTIN_SPECIFICATION_PATH,
} from './domain/spec/SpecificationTable'
export { FieldResolver, readInteger } from './domain/spec/FieldResolver'
export { parseRational, decimalsFor } from './domain/spec/rational'
export { RecordAssembler, deviceId } from './domain/records/RecordAssembler'
export type { AssemblerOptions, CompletedRecord } from './domain/records/RecordAssembler'
export { repeatedCommandRule, fixedLengthRule, leadingCommandRule } from './domain/records/cycleRules'
export type { CycleBoundaryRule } from './domain/records/cycleRules'
export { TabularSerializer, headerLabel } from './domain/export/TabularSerializer'
export type { SerializerOptions } from './domain/export/TabularSerializer'
export { createMemorySink, FileSink } from './domain/export/sinks'
export type { RowSink, MemorySink } from './domain/export/sinks'
export { createTimestampFormatter } from './domain/export/formatting'
export type { TimestampStyle } from './domain/export/formatting'
export { RecordingConverter, convertRecording } from './domain/RecordingConverter'
export type { ConverterOptions, ProgressCallback } from './domain/RecordingConverter'
export { datecodeFromFilename, startOfDay } from './domain/utils/datecode'
export { SettingsStore, SettingsError, DEFAULT_SETTINGS } from './stores/SettingsStore'
export type { ConverterSettings, CycleRuleSetting } from './stores/SettingsStore'
export { ConversionStore } from './stores/ConversionStore'
export type { FileConversion, ConversionStatus, ConvertOptions } from './stores/ConversionStore'
export { RootStore } from './stores/RootStore'
