import { parseCliArgs, toMonitorRequest } from "@/lib/cli";
import { loadConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { MonitorPipeline } from "@/lib/pipeline";

async function main(argv: string[]): Promise<void> {
  const config = loadConfig();
  const command = parseCliArgs(argv, config.lookbackDaysLimit);
  if (command.kind === "help") {
    console.log(command.text);
    return;
  }

  const result = await new MonitorPipeline(config).run(toMonitorRequest(command.options));
  for (const path of result.csvPaths) {
    console.info(`Saved ${path}`);
  }
  if (result.plotPath) {
    console.info(`Saved plot to ${result.plotPath}`);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
