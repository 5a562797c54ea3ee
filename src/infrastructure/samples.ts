/**
 * Sample Data
 *
 * Seed documents read from YAML lists under data/samples/
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { parse } from 'yaml'
import { z } from 'zod'
import { errorCode } from '../errors'

export const SatelliteSample = z
  .object({
    satellite_id: z.string(),
    name: z.string(),
    type: z.string(),
    status: z.string(),
    launch_date: z.coerce.date().optional(),
    mission: z.string().optional(),
    owner: z.string().optional(),
    tle: z
      .object({
        line1: z.string().optional(),
        line2: z.string().optional(),
        epoch: z.coerce.date().optional(),
      })
      .passthrough()
      .optional(),
    subsystems: z.array(z.unknown()).optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough()

export const GroundStationSample = z
  .object({
    station_id: z.string(),
    name: z.string(),
    location: z
      .object({
        latitude: z.number(),
        longitude: z.number(),
        altitude: z.number().optional(),
      })
      .passthrough(),
    capabilities: z.array(z.unknown()).optional(),
    status: z.string().optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough()

export type SatelliteSample = z.infer<typeof SatelliteSample>
export type GroundStationSample = z.infer<typeof GroundStationSample>

export const SAMPLE_FILES = {
  satellites: 'satellites.yaml',
  groundStations: 'ground_stations.yaml',
} as const

/**
 * Read and validate a YAML list of samples
 *
 * @returns null when the file does not exist; an empty file is an empty list
 * @throws ZodError when an entry does not match the schema
 */
export async function loadSamples<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>[] | null> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return null
    throw error
  }

  const document: unknown = parse(text)
  if (document === null || document === undefined) return []
  return z.array(schema).parse(document)
}

export function loadSatelliteSamples(samplesDir: string): Promise<SatelliteSample[] | null> {
  return loadSamples(join(samplesDir, SAMPLE_FILES.satellites), SatelliteSample)
}

export function loadGroundStationSamples(samplesDir: string): Promise<GroundStationSample[] | null> {
  return loadSamples(join(samplesDir, SAMPLE_FILES.groundStations), GroundStationSample)
}
