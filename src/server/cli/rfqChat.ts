import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { currencySymbol } from "@/lib/formatCurrency";
import { extractRfqMetaFromText } from "@/lib/rfq/extractMeta";
import { buildRfqCsv } from "@/lib/rfqCsv";
import { getAppConfig } from "@/server/config";
import { createLogger, serializeError } from "@/server/logging";
import { createRfq } from "@/server/rfqs/createRfq";
import { getRecordStore, type RecordStore } from "@/server/store";

const log = createLogger("cli");

const USAGE = "Usage: rfq-chat [--out <dir>] <free text describing the request>";

export type RfqChatArgs = {
  text: string;
  outDir: string | null;
};

export function parseRfqChatArgs(argv: readonly string[]): RfqChatArgs {
  const words: string[] = [];
  let outDir: string | null = null;
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--out") {
      outDir = argv[i + 1] ?? null;
      i += 1;
      continue;
    }
    if (arg !== undefined) words.push(arg);
  }
  return { text: words.join(" ").trim(), outDir };
}

export type RfqChatIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const consoleIo: RfqChatIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Creates an RFQ from free text with one default wholesale line item and
 * writes its summary CSV. Resolves to the process exit code.
 */
export async function runRfqChat(
  argv: readonly string[],
  deps?: { store?: RecordStore; cwd?: string; io?: RfqChatIo; currency?: string },
): Promise<number> {
  const io = deps?.io ?? consoleIo;
  const args = parseRfqChatArgs(argv);
  if (!args.text) {
    io.err(USAGE);
    return 1;
  }

  try {
    const meta = extractRfqMetaFromText(args.text);
    const result = await createRfq(
      {
        metaText: args.text,
        lineItems: [
          { kind: "wholesale", size: "L", pack: "tray", qtyWeek: 120, targetPrice: meta.targetPrice },
        ],
      },
      { store: deps?.store ?? getRecordStore() },
    );
    if (!result.ok) {
      io.err(`Could not create RFQ: ${result.error}`);
      return 1;
    }

    const { rfq } = result;
    const dir = path.resolve(deps?.cwd ?? process.cwd(), args.outDir ?? ".");
    await mkdir(dir, { recursive: true });
    const csvPath = path.join(dir, `rfq_${rfq.id}.csv`);
    const csv = buildRfqCsv(rfq, { currencySymbol: currencySymbol(deps?.currency ?? getAppConfig().currency) });
    await writeFile(csvPath, csv, "utf8");

    io.out("--- RFQ Created ---");
    io.out(JSON.stringify(rfq, null, 2));
    io.out(`RFQ saved to ${csvPath}`);
    return 0;
  } catch (error) {
    log.error("rfq chat failed", { error: serializeError(error) });
    io.err(`Could not create RFQ: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
