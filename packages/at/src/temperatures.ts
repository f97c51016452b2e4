import type { Temperatures } from "@cellgate/shared";
import { linesWithPrefix, splitFields, toInt } from "./fields";

type SensorGroup = "pa" | "baseband" | "ambient" | "mmw";

const SENSOR_GROUPS: Record<string, readonly [SensorGroup, string | null]> = {
  "modem-lte-sub6-pa1": ["pa", "lte_pa1"],
  "modem-lte-sub6-pa2": ["pa", "lte_pa2"],
  "modem-sdr0-pa0": ["pa", "sdr0_pa0"],
  "modem-sdr0-pa1": ["pa", "sdr0_pa1"],
  "modem-sdr0-pa2": ["pa", "sdr0_pa2"],
  "modem-sdr1-pa0": ["pa", "sdr1_pa0"],
  "modem-sdr1-pa1": ["pa", "sdr1_pa1"],
  "modem-sdr1-pa2": ["pa", "sdr1_pa2"],
  "modem-mmw0": ["mmw", null],
  "modem-ambient-usr": ["ambient", null],
  "aoss-0-usr": ["baseband", "aoss_0_usr"],
  "cpuss-0-usr": ["baseband", "cpuss_0_usr"],
  "mdmq6-0-usr": ["baseband", "mdmq6_0_usr"],
  "mdmss-0-usr": ["baseband", "mdmss_0_usr"],
  "mdmss-1-usr": ["baseband", "mdmss_1_usr"],
  "mdmss-2-usr": ["baseband", "mdmss_2_usr"],
  "mdmss-3-usr": ["baseband", "mdmss_3_usr"],
};

// -273 is what the modem reports for a powered-down sensor.
const SENSOR_OFF = -273;

/** Decodes `+QTEMP:"<name>","<celsius>"` rows; unknown sensor names land in `baseband`. */
export const decodeTemperatures = (lines: readonly string[] | undefined): Temperatures | null => {
  const rows = linesWithPrefix(lines, "+QTEMP:").map(splitFields);
  if (rows.length === 0) {
    return null;
  }
  const temps: Temperatures = { ambient: null, mmw: null, pa: {}, baseband: {}, sensors: {} };
  for (const [name, raw] of rows) {
    const value = toInt(raw);
    if (!name || value === null || value === SENSOR_OFF) {
      continue;
    }
    temps.sensors[name] = value;
    const group = SENSOR_GROUPS[name];
    if (!group) {
      temps.baseband[name.replace(/-/g, "_")] = value;
      continue;
    }
    const [category, key] = group;
    if (category === "ambient") {
      temps.ambient = value;
    } else if (category === "mmw") {
      temps.mmw = value;
    } else if (key) {
      temps[category][key] = value;
    }
  }
  return temps;
};
