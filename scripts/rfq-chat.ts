import { runRfqChat } from "../src/server/cli/rfqChat";

async function main() {
  process.exitCode = await runRfqChat(process.argv.slice(2));
}

void main();
