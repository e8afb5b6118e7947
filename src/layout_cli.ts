import { loadConfigFromEnv } from "./config";
import { parseHexBytes } from "./hex";
import { formatLayoutTable, traceHidReportDescriptor } from "./hid/hid_descriptor_trace";
import { detectPointerDevice } from "./hid/hid_device_type";
import { computeInputReportPayloadByteLengths } from "./hid/hid_report_sizes";
import { formatError, log, setLogLevel } from "./logger";
import { BUILTIN_HID_REPORT_DESCRIPTORS } from "./usb/hid_descriptors";

export type LayoutCliIo = {
  env: Readonly<Record<string, string | undefined>>;
  readFile: (path: string) => Promise<string>;
  readStdin: () => Promise<string>;
  writeLine: (line: string) => void;
};

const USAGE = `
Usage:
  hid-layout [<descriptor.hex>] [--builtin <name>] [--trace]

Reads a HID report descriptor as hex (from the file, or stdin when no file is given) and prints
the pointer field layout of every report id.

Options:
  --builtin <name>   Use a built-in descriptor instead (${Object.keys(BUILTIN_HID_REPORT_DESCRIPTORS).join(", ")})
  --trace            Print one line per descriptor item (also HID_LAYOUT_TRACE=1)
  --help             Show this message

Environment:
  HID_LAYOUT_LOG_LEVEL              debug | info | warn | error (default: info)
  HID_LAYOUT_TRACE                  0/1 (default: 0)
  HID_LAYOUT_MAX_DESCRIPTOR_BYTES   1..65535 (default: 4096)
`.trim();

function parseArgs(argv: readonly string[]): { flags: Record<string, string>; positional: string[] } {
  const flags: Record<string, string> = {};
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    if (a === undefined) continue;
    if (!a.startsWith("--")) {
      positional.push(a);
      continue;
    }
    const k = a.slice(2);
    const v = argv[i + 1];
    if (k === "builtin" && v !== undefined && !v.startsWith("--")) {
      flags[k] = v;
      i += 1;
    } else {
      flags[k] = "true";
    }
  }
  return { flags, positional };
}

async function loadDescriptor(flags: Record<string, string>, positional: string[], io: LayoutCliIo): Promise<Uint8Array> {
  const builtin = flags.builtin;
  if (builtin !== undefined) {
    // Own keys only; names such as `toString` must not reach Object.prototype.
    const bytes = Object.hasOwn(BUILTIN_HID_REPORT_DESCRIPTORS, builtin) ? BUILTIN_HID_REPORT_DESCRIPTORS[builtin] : undefined;
    if (!bytes) throw new Error(`unknown builtin descriptor: ${builtin}`);
    return bytes;
  }
  const path = positional[0];
  const text = path === undefined ? await io.readStdin() : await io.readFile(path);
  return parseHexBytes(text);
}

/** Run the layout tool; resolves with the process exit code. */
export async function runLayoutCli(argv: readonly string[], io: LayoutCliIo): Promise<number> {
  const { flags, positional } = parseArgs(argv);
  if (flags.help !== undefined) {
    io.writeLine(USAGE);
    return 0;
  }

  try {
    const config = loadConfigFromEnv(io.env);
    setLogLevel(config.logLevel);

    const descriptor = await loadDescriptor(flags, positional, io);
    log("debug", "descriptor_loaded", { bytes: descriptor.byteLength });

    const { layouts, lines, truncation } = traceHidReportDescriptor(descriptor, {
      maxDescriptorBytes: config.maxDescriptorBytes,
    });
    if (config.trace || flags.trace !== undefined) {
      for (const line of lines) io.writeLine(line);
    }
    if (truncation) {
      log("warn", "descriptor_truncated", { ...truncation, bytes: descriptor.byteLength });
    }

    for (const line of formatLayoutTable(layouts)) io.writeLine(line);

    const device = detectPointerDevice(layouts);
    log("info", "layout_decoded", {
      reports: layouts.size,
      isMouse: device.isMouse,
      pointerReportId: device.layout?.reportId ?? null,
      payloadBytes: Object.fromEntries(computeInputReportPayloadByteLengths(layouts)),
    });
    return 0;
  } catch (err) {
    log("error", "cli_error", { error: formatError(err) });
    return 1;
  }
}
