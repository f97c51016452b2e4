/** Gateway host figures; each optional reading is null when the host does not expose it. */
export type HostInfoResponse = {
  ok: boolean;
  ts: number;
  error: string | null;
  hostname: string;
  os_name: string;
  os_version: string;
  arch: string;
  uptime_sec: number | null;
  load_1: number | null;
  load_5: number | null;
  load_15: number | null;
  mem_total_kb: number | null;
  mem_used_kb: number | null;
  mem_free_kb: number | null;
  disk_total_gb: number | null;
  disk_used_gb: number | null;
  disk_free_gb: number | null;
  soc_temp_c: number | null;
};
