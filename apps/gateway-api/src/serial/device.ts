import fs from "fs";
import path from "path";
import { TransportError } from "../errors/transport";

/** Filesystem reads used to find the modem's AT tty; injected so tests can fake sysfs. */
export type DeviceProbe = {
  exists: (target: string) => boolean;
  realpath: (target: string) => string | null;
  list: (dir: string) => string[];
};

export const nodeDeviceProbe: DeviceProbe = {
  exists: (target) => fs.existsSync(target),
  realpath: (target) => {
    try {
      return fs.realpathSync(target);
    } catch {
      return null;
    }
  },
  list: (dir) => {
    try {
      return fs.readdirSync(dir);
    } catch {
      return [];
    }
  },
};

const SYS_TTY = "/sys/class/tty";
const SYS_USB_DEVICES = "/sys/bus/usb/devices";
const TTY_USB = /^ttyUSB\d+$/;

/**
 * USB interface id (e.g. `2-1:1.2`) that owns a tty, read from the sysfs link
 * `/sys/class/tty/ttyUSB2 -> .../2-1/2-1:1.2/ttyUSB2/tty/ttyUSB2`.
 */
export const interfaceIdOf = (device: string, probe: DeviceProbe) => {
  const sysPath = path.posix.join(SYS_TTY, path.posix.basename(device));
  if (!probe.exists(sysPath)) {
    return null;
  }
  const real = probe.realpath(sysPath);
  if (!real) {
    return null;
  }
  const id = path.posix.basename(path.posix.dirname(path.posix.dirname(path.posix.dirname(real))));
  return id.includes(":1.") ? id : null;
};

export type DeviceResolver = {
  /** Configured path, then the remembered interface, then a suffix scan. */
  resolve: () => string;
  /** Records the interface behind a path that opened, for the next resolution. */
  remember: (device: string) => void;
  readonly interfaceId: string | null;
};

export const createDeviceResolver = (options: {
  configuredPath: string | null;
  interfaceSuffix: string;
  probe?: DeviceProbe;
}): DeviceResolver => {
  const probe = options.probe ?? nodeDeviceProbe;
  let interfaceId: string | null = null;
  let suffix = options.interfaceSuffix;

  const byInterface = () => {
    if (!interfaceId) {
      return null;
    }
    const dir = path.posix.join(SYS_USB_DEVICES, interfaceId);
    const ttys = probe
      .list(dir)
      .filter((name) => TTY_USB.test(name))
      .sort();
    for (const name of ttys) {
      const candidate = path.posix.join("/dev", name);
      if (probe.exists(candidate)) {
        return candidate;
      }
    }
    return null;
  };

  const bySuffix = () => {
    if (!suffix) {
      return null;
    }
    const ttys = probe
      .list("/dev")
      .filter((name) => TTY_USB.test(name))
      .sort();
    for (const name of ttys) {
      const candidate = path.posix.join("/dev", name);
      const id = interfaceIdOf(candidate, probe);
      if (id && id.endsWith(suffix)) {
        interfaceId = id;
        return candidate;
      }
    }
    return null;
  };

  const remember = (device: string) => {
    const id = interfaceIdOf(device, probe);
    if (!id) {
      return;
    }
    interfaceId = id;
    suffix = id.slice(id.indexOf(":1."));
  };

  const resolve = () => {
    if (options.configuredPath && probe.exists(options.configuredPath)) {
      return options.configuredPath;
    }
    const found = byInterface() ?? bySuffix();
    if (found) {
      console.log(`[transport] resolved modem interface ${interfaceId ?? "?"} to ${found}`);
      return found;
    }
    throw new TransportError(
      "device_not_found",
      `Serial device ${options.configuredPath ?? "(unset)"} not found and no ${suffix} interface could be resolved.`
    );
  };

  return {
    resolve,
    remember,
    get interfaceId() {
      return interfaceId;
    },
  };
};
