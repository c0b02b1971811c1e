#!/usr/bin/env node
import { Command } from "commander";
import fs from "fs/promises";
import path from "path";
import ora from "ora";
import { Application } from ".";
import { loadConfig } from "./config";
import { STATISTICS_SCOPES, StatisticsScope, isTargetFormat } from "./models";
import { outputArchiveName, renderStatistics, renderSummary } from "./services/sessionPresenter";
import { errorMessage } from "./utils/error";

interface ServeOptions {
  skipValidation?: boolean;
}

interface ConvertOptions {
  format: string;
  output?: string;
}

interface StatsOptions {
  json?: boolean;
  raw?: boolean;
}

function isStatisticsScope(value: string): value is StatisticsScope {
  return STATISTICS_SCOPES.some((scope) => scope === value);
}

export class CLI {
  private program: Command;

  constructor() {
    this.program = new Command();
    this.program.name("image-format-bot").description("Image format conversion bot");
    this.setupCommands();
  }

  setupCommands() {
    this.program
      .command("serve")
      .description("Run the bot until interrupted")
      .option("--skip-validation", "Skip the startup codec check", false)
      .action(async (options: ServeOptions) => {
        await this.runServer(options);
      });

    this.program
      .command("convert")
      .description("Convert local images or ZIP archives into a ZIP of the chosen format")
      .argument("<inputs...>", "image files or ZIP archives")
      .requiredOption("-f, --format <format>", "target format (JPEG, PNG, WEBP, GIF, TIFF, BMP, AVIF)")
      .option("-o, --output <file>", "where to write the resulting ZIP")
      .action(async (inputs: string[], options: ConvertOptions) => {
        await this.runConversion(inputs, options);
      });

    this.program
      .command("stats")
      .description("Show conversion statistics")
      .argument("[scope]", "today, month or all", "all")
      .option("--json", "Print the query result as JSON", false)
      .option("--raw", "Print the whole statistics record as JSON", false)
      .action(async (scope: string, options: StatsOptions) => {
        await this.showStatistics(scope, options);
      });

    this.program
      .command("health")
      .description("Check Bot API reachability and host resources")
      .action(async () => {
        await this.runHealthCheck();
      });
  }

  private async runServer(options: ServeOptions): Promise<void> {
    const spinner = ora("🚀 Starting bot...").start();
    try {
      const app = new Application({ skipValidation: options.skipValidation || false });
      await app.start();
      spinner.succeed(`Bot running in ${app.getConfig().telegram.mode} mode`);
    } catch (error) {
      spinner.fail("Startup failed");
      console.error("Error details:", errorMessage(error));
      process.exit(1);
    }
  }

  private async runConversion(inputs: string[], options: ConvertOptions): Promise<void> {
    const format = options.format.toUpperCase();
    if (!isTargetFormat(format)) {
      console.error(`Unknown format: ${options.format}`);
      process.exit(1);
    }

    const spinner = ora(`🖼️  Converting to ${format}...`).start();
    try {
      const app = new Application({
        config: loadConfig(process.env, { requireBotToken: false }),
        skipSignalHandlers: true,
      });
      await app.initialize();

      const { outcome, archive } = await app.convertFiles(inputs, format, (progress) => {
        spinner.text = `🖼️  Converted ${progress.processed}/${progress.total}`;
      });

      if (!archive) {
        spinner.fail("No images were converted");
        process.exitCode = 1;
        return;
      }

      const output = path.resolve(options.output ?? outputArchiveName());
      await fs.writeFile(output, archive);
      spinner.succeed(`Wrote ${output}`);
      console.log(renderSummary(outcome));
    } catch (error) {
      spinner.fail("Conversion failed");
      console.error("Error details:", errorMessage(error));
      process.exit(1);
    }
  }

  private async showStatistics(scope: string, options: StatsOptions): Promise<void> {
    if (!isStatisticsScope(scope)) {
      console.error(`Unknown scope: ${scope}. Use today, month or all.`);
      process.exit(1);
    }

    try {
      const app = new Application({
        config: loadConfig(process.env, { requireBotToken: false }),
        skipValidation: true,
        skipSignalHandlers: true,
      });
      await app.initialize();

      if (options.raw) {
        console.log(JSON.stringify(app.statisticsRecord(), null, 2));
        return;
      }
      const result = app.queryStatistics(scope);
      console.log(options.json ? JSON.stringify(result, null, 2) : renderStatistics(result));
    } catch (error) {
      console.error("❌ Failed to load statistics:", errorMessage(error));
      process.exit(1);
    }
  }

  private async runHealthCheck(): Promise<void> {
    const spinner = ora("🏥 Running health check...").start();
    try {
      const app = new Application({ skipSignalHandlers: true });
      const health = await app.getHealthStatus();

      if (health.status === "unhealthy") {
        spinner.fail("Health check failed");
        process.exitCode = 1;
      } else {
        spinner.succeed(`Health check completed: ${health.status}`);
      }

      const { telegram, memory, disk } = health.services;
      console.log("\n📊 System Status:");
      console.log(
        `   🤖 Bot API: ${telegram.status}${telegram.details.username ? ` (@${telegram.details.username})` : ""}`
      );
      console.log(`   🧠 Memory: ${memory.status} (${memory.details.percentage.toFixed(1)}% used)`);
      console.log(`   💾 Disk: ${disk.status} (${disk.details.percentage.toFixed(1)}% used)`);
    } catch (error) {
      spinner.fail("Health check failed");
      console.error("Error details:", errorMessage(error));
      process.exit(1);
    }
  }

  async run(): Promise<void> {
    await this.program.parseAsync(process.argv);
  }
}

// Run CLI if this file is executed directly
if (require.main === module) {
  const cli = new CLI();
  cli.run().catch((error: unknown) => {
    console.error("CLI Error:", errorMessage(error));
    process.exit(1);
  });
}

// Main function for programmatic usage
export async function main(args?: string[]): Promise<void> {
  const cli = new CLI();

  if (args) {
    // Override process.argv for testing
    const originalArgv = process.argv;
    process.argv = ["node", "cli.js", ...args];

    try {
      await cli.run();
    } finally {
      process.argv = originalArgv;
    }
  } else {
    await cli.run();
  }
}
