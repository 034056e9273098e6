import { UnknownSensorError } from "./errors.js";

/** Static layout of one sensor's scenes on disk. */
export type SensorConfig = Readonly<{
  /** Subdirectory of the dataset root holding the sensor's scenes. */
  folder: string;
  /** Spectral bands the sensor provides, in catalog order. */
  bands: readonly string[];
}>;

function bandRange(first: number, last: number): string[] {
  return Array.from({ length: last - first + 1 }, (_, i) => `B${first + i}`);
}

// Sensor generations that share an instrument share one entry.
// https://www.usgs.gov/faqs/what-are-band-designations-landsat-satellites

/** Landsat 8-9 Operational Land Imager (OLI) and Thermal Infrared Sensor (TIRS). */
const LANDSAT_8_9: SensorConfig = {
  folder: "landsat_8_9",
  bands: bandRange(1, 11),
};

/** Landsat 7 Enhanced Thematic Mapper Plus (ETM+). */
const LANDSAT_7: SensorConfig = {
  folder: "landsat_7",
  bands: bandRange(1, 8),
};

/** Landsat 4-5 Thematic Mapper (TM). */
const LANDSAT_4_5_TM: SensorConfig = {
  folder: "landsat_4_5_tm",
  bands: bandRange(1, 7),
};

/** Landsat 4-5 Multispectral Scanner (MSS). */
const LANDSAT_4_5_MSS: SensorConfig = {
  folder: "landsat_4_5_mss",
  bands: bandRange(1, 4),
};

/** Landsat 1-3 Multispectral Scanner (MSS). */
const LANDSAT_1_3: SensorConfig = {
  folder: "landsat_1_3",
  bands: bandRange(4, 7),
};

export const SENSORS = {
  landsat1: LANDSAT_1_3,
  landsat2: LANDSAT_1_3,
  landsat3: LANDSAT_1_3,
  landsat4mss: LANDSAT_4_5_MSS,
  landsat5mss: LANDSAT_4_5_MSS,
  landsat4tm: LANDSAT_4_5_TM,
  landsat5tm: LANDSAT_4_5_TM,
  landsat7: LANDSAT_7,
  landsat8: LANDSAT_8_9,
  landsat9: LANDSAT_8_9,
} as const satisfies Record<string, SensorConfig>;

export type SensorName = keyof typeof SENSORS;

export function isSensorName(name: string): name is SensorName {
  return Object.hasOwn(SENSORS, name);
}

/** Look up a sensor by name, throwing UnknownSensorError for anything else. */
export function getSensor(name: string): SensorConfig {
  if (!isSensorName(name)) {
    throw new UnknownSensorError(name, Object.keys(SENSORS));
  }
  return SENSORS[name];
}
