import { makeAutoObservable, runInAction } from 'mobx'
import { mkdir, readFile } from 'node:fs/promises'
import { basename, extname, join } from 'node:path'
import type { ConversionSummary, DeviceKey } from '../domain/types/Telegram'
import { convertRecording } from '../domain/RecordingConverter'
import { deviceId } from '../domain/records/RecordAssembler'
import { FileSink } from '../domain/export/sinks'
import {
  type SpecificationTable,
  loadBuiltinSpecification,
  loadSpecificationFile,
} from '../domain/spec/SpecificationTable'
import { type DayWindow, dayWindow, datecodeFromFilename } from '../domain/utils/datecode'
import type { SettingsStore } from './SettingsStore'

export type ConversionStatus = 'idle' | 'converting' | 'success' | 'error'

export interface FileConversion {
  path: string
  status: ConversionStatus
  progress: number
  message: string
  summary: ConversionSummary | null
  outputs: string[]
  error: string | null
}

export interface ConvertOptions {
  outDir: string
  /**
   * Overrides the start time taken from the file's datecode. Records are
   * only clipped to the datecode's day when this is absent.
   */
  startTimestamp?: number
}

export interface ProgressEvent {
  path: string
  progress: number
  message: string
}

/** "<outDir>/<recording base name>_<source>_<destination><ext>" */
export function outputPath(outDir: string, recording: string, device: DeviceKey, extension: string): string {
  const name = basename(recording, extname(recording))
  return join(outDir, `${name}_${deviceId(device)}${extension}`)
}

/**
 * Store for recording conversions and their progress
 */
export class ConversionStore {
  conversions: FileConversion[] = []
  /** Most recent progress report from any conversion */
  lastProgress: ProgressEvent | null = null

  private readonly settingsStore: SettingsStore
  private specification: SpecificationTable | null = null
  private specificationSource: string | null = null

  constructor(settingsStore: SettingsStore) {
    this.settingsStore = settingsStore
    makeAutoObservable<this, 'settingsStore' | 'specification' | 'specificationSource'>(this, {
      settingsStore: false,
      specification: false,
      specificationSource: false,
    })
  }

  get isBusy(): boolean {
    return this.conversions.some(c => c.status === 'converting')
  }

  get failedCount(): number {
    return this.conversions.filter(c => c.status === 'error').length
  }

  get totalRecords(): number {
    return this.conversions.reduce((sum, c) => sum + (c.summary?.recordsEmitted ?? 0), 0)
  }

  /** Converts files one after another; a failed file does not stop the rest. */
  convertAll = async (paths: string[], options: ConvertOptions): Promise<FileConversion[]> => {
    const results: FileConversion[] = []
    for (const path of paths) {
      results.push(await this.convertFile(path, options))
    }
    return results
  }

  convertFile = async (path: string, options: ConvertOptions): Promise<FileConversion> => {
    runInAction(() => {
      this.conversions.push({
        path,
        status: 'converting',
        progress: 0,
        message: 'Reading file...',
        summary: null,
        outputs: [],
        error: null,
      })
    })
    const conversion = this.conversions[this.conversions.length - 1]

    const sinks: FileSink[] = []
    try {
      const buffer = new Uint8Array(await readFile(path))
      const settings = this.settingsStore
      let startTimestamp = options.startTimestamp
      let day: DayWindow | null = null
      if (startTimestamp === undefined) {
        day = this.dayOfRecording(path, settings.settings.timeZone)
        startTimestamp = day.start
      }
      const specification = this.loadSpecification()
      await mkdir(options.outDir, { recursive: true })

      const summary = convertRecording(buffer, {
        specification,
        startTimestamp,
        minTimestamp: day?.start,
        maxTimestamp: day?.end,
        samplingIntervalMs: settings.samplingIntervalMs,
        cycleRule: settings.cycleBoundaryRule,
        serializer: settings.serializerOptions,
        sinkFor: (device) => {
          const sink = new FileSink(outputPath(options.outDir, path, device, settings.settings.outputExtension))
          sinks.push(sink)
          return sink
        },
      }, (progress, message) => this.reportProgress(conversion, progress, message))

      const outputs = sinks.filter(s => s.opened).map(s => s.path)
      runInAction(() => {
        conversion.status = 'success'
        conversion.summary = summary
        conversion.outputs = outputs
        conversion.message = `Wrote ${summary.recordsEmitted} records to ${outputs.length} file(s)`
      })
    } catch (err) {
      console.error(`Conversion of ${path} failed:`, err)
      runInAction(() => {
        conversion.status = 'error'
        conversion.error = err instanceof Error ? err.message : String(err)
        conversion.message = 'Conversion failed'
      })
    } finally {
      for (const sink of sinks) sink.close()
    }

    return conversion
  }

  reset(): void {
    this.conversions = []
    this.lastProgress = null
    this.specification = null
    this.specificationSource = null
  }

  private reportProgress(conversion: FileConversion, progress: number, message: string): void {
    conversion.progress = progress
    conversion.message = message
    this.lastProgress = { path: conversion.path, progress, message }
  }

  private dayOfRecording(path: string, timeZone: string): DayWindow {
    const datecode = datecodeFromFilename(path)
    if (!datecode) {
      throw new Error(`Cannot tell when ${basename(path)} starts: name it YYYYMMDD... or pass a start time`)
    }
    return dayWindow(datecode, timeZone)
  }

  private loadSpecification(): SpecificationTable {
    const file = this.settingsStore.settings.specificationFile
    if (!this.specification || this.specificationSource !== file) {
      this.specification = file ? loadSpecificationFile(file) : loadBuiltinSpecification()
      this.specificationSource = file
    }
    return this.specification
  }
}
