export type RegistrationState =
  | "not_registered"
  | "registered_home"
  | "searching"
  | "denied"
  | "unknown"
  | "registered_roaming"
  | "sms_only"
  | "csfb_or_sms_only"
  | "emergency_only"
  | "csfb_not_preferred"
  | "home_emergency_only"
  | "other";

export type RegistrationStatus = {
  code: number;
  state: RegistrationState;
  text: string;
};

export type RegistrationInfo = {
  ps: RegistrationStatus | null;
  eps: RegistrationStatus | null;
  nr5g: RegistrationStatus | null;
};

export type Duplex = "FDD" | "TDD";

export type AccessMode = {
  rat: string | null;
  duplex: Duplex | null;
  technology: string | null;
};

export type OperatorInfo = {
  name: string | null;
  mcc: string | null;
  mnc: string | null;
  band: string | null;
  channel: number | null;
};

export type SignalQuality = "excellent" | "good" | "fair" | "poor";

export type SignalBlock = {
  rsrp: number | null;
  rsrq: number | null;
  sinr: number | null;
  quality: SignalQuality | null;
};

export type SignalInfo = {
  rsrp: number | null;
  rsrq: number | null;
  sinr: number | null;
  sysmode: string | null;
  lte: SignalBlock | null;
  nr: SignalBlock | null;
};

export type BandRat = "LTE" | "NR";

export type BandInfo = {
  rat: BandRat;
  number: number;
  name: string;
  label: string;
  frequency: string | null;
  duplex: string | null;
};

export type CellIdentity = {
  tac_hex: string | null;
  tac: number | null;
  cell_id_hex: string | null;
  cell_id: number | null;
  node_id: number | null;
  local_cell_id: number | null;
};

export type LteCellDetail = {
  duplex: Duplex | null;
  mcc: string | null;
  mnc: string | null;
  identity: CellIdentity;
  pci: number | null;
  earfcn: number | null;
  band: BandInfo | null;
  ul_bw_mhz: number | null;
  dl_bw_mhz: number | null;
  rsrp: number | null;
  rsrq: number | null;
  rssi: number | null;
  sinr: number | null;
  cqi: number | null;
  tx_power: number | null;
  srxlev: number | null;
};

export type LteServingCell = LteCellDetail & {
  rat: "LTE";
  state: string | null;
  signal: SignalBlock;
};

export type NrSaServingCell = {
  rat: "NR5G-SA";
  state: string | null;
  duplex: Duplex | null;
  mcc: string | null;
  mnc: string | null;
  identity: CellIdentity;
  pci: number | null;
  nrarfcn: number | null;
  band: BandInfo | null;
  dl_bw_mhz: number | null;
  rsrp: number | null;
  rsrq: number | null;
  sinr: number | null;
  scs_khz: number | null;
  srxlev: number | null;
  signal: SignalBlock;
};

export type NrNsaLeg = {
  mcc: string | null;
  mnc: string | null;
  pci: number | null;
  rsrp: number | null;
  sinr: number | null;
  rsrq: number | null;
  nrarfcn: number | null;
  band: BandInfo | null;
  dl_bw_mhz: number | null;
  scs_khz: number | null;
  signal: SignalBlock;
};

export type NrNsaServingCell = {
  rat: "NR5G-NSA";
  state: string | null;
  lte: (LteCellDetail & { signal: SignalBlock }) | null;
  nr: NrNsaLeg | null;
};

export type ServingCell = LteServingCell | NrSaServingCell | NrNsaServingCell;

export type CarrierComponent = {
  rat: BandRat;
  arfcn: number | null;
  dl_bw_mhz: number | null;
  band: BandInfo | null;
  pci: number | null;
  rsrp: number | null;
  rsrq: number | null;
  rssi: number | null;
  sinr: number | null;
};

export type SecondaryCarrier = CarrierComponent & { index: number };

export type CarrierAggregation = {
  primary: CarrierComponent | null;
  secondary: SecondaryCarrier[];
  summary: string | null;
};

export type LteNeighbour = {
  scope: "intra" | "inter" | null;
  earfcn: number;
  pci: number;
  rsrq: number | null;
  rsrp: number | null;
  rssi: number | null;
  sinr: number | null;
  srxlev: number | null;
  band: string | null;
};

export type NrNeighbour = {
  nrarfcn: number;
  pci: number;
  rsrp: number | null;
  rsrq: number | null;
  sinr: number | null;
  scs_khz: number | null;
  band: string | null;
};

export type NeighbourCells = {
  lte: LteNeighbour[];
  nr: NrNeighbour[];
};

export type NetdevStats = {
  iface: string | null;
  state: string | null;
  ipv4: string | null;
  rx_bytes: number | null;
  tx_bytes: number | null;
  rx_rate_bps: number | null;
  tx_rate_bps: number | null;
  source: "modem" | "sysfs";
};

export type PdpContext = {
  cid: number;
  type: string | null;
  apn: string | null;
  state: number | null;
  ip: string | null;
  dns1: string | null;
  dns2: string | null;
};

export type SessionInfo = {
  default_cid: number | null;
  pdp: PdpContext[];
};

export type Temperatures = {
  ambient: number | null;
  mmw: number | null;
  pa: Record<string, number>;
  baseband: Record<string, number>;
  sensors: Record<string, number>;
};

export type LiveTelemetry = {
  registration: RegistrationInfo | null;
  mode: AccessMode | null;
  operator: OperatorInfo | null;
  signal: SignalInfo | null;
  serving: ServingCell | null;
  carrier_aggregation: CarrierAggregation | null;
  neighbours: NeighbourCells | null;
  netdev: NetdevStats | null;
  session: SessionInfo | null;
  temperatures: Temperatures | null;
};

export type LiveResponse = {
  ok: boolean;
  ts: number;
  error: string | null;
  cycle: number | null;
  captured_at: string | null;
  stale_ms: number | null;
  data: LiveTelemetry | null;
};

export type DeviceIdentity = {
  manufacturer: string | null;
  model: string | null;
  revision: string | null;
  imei: string | null;
};

export type SimInfo = {
  imsi: string | null;
  iccid: string | null;
  msisdn: string | null;
  enabled: boolean | null;
  inserted: boolean | null;
};

export type UsbSpeed = {
  code: number;
  label: string | null;
};

export type DeviceInfo = {
  info: DeviceIdentity;
  sim: SimInfo;
  modem: { usb: UsbSpeed | null };
};

export type InfoResponse = DeviceInfo & {
  ok: boolean;
  ts: number;
  error: string | null;
  raw?: Record<string, string[]>;
};
