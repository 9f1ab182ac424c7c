#!/usr/bin/env node
import { Command, Option } from "commander";
import { runSiteAudit, SiteAuditConfigSchema } from "./audit";
import { getConfig } from "./config";
import { createAuditServices } from "./services";
import { formatConsoleReport, writeCsvReport, writeJsonReport } from "./report";

interface CliOptions {
  keywords?: string[];
  pages?: string;
  ai?: boolean;
  output: "console" | "json" | "csv";
  timeoutMs?: string;
  concurrency?: string;
}

function progress(message: string): void {
  console.error(`[seo-audit] ${message}`);
}

function toInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseInt(value, 10);
}

const env = getConfig();
const program = new Command();

program
  .name("seo-audit")
  .description("Audit the on-page SEO of a website")
  .version("1.0.0")
  .argument("<url>", "The website URL to analyze")
  .option("-k, --keywords <keywords...>", "Keywords to check rankings for")
  .option("-p, --pages <number>", "Maximum number of pages to analyze", String(env.CRAWL_LIMIT))
  .option("--ai", "Generate AI suggestions for the first pages")
  .addOption(new Option("-o, --output <format>", "Output format").choices(["console", "json", "csv"]).default("console"))
  .option("--timeoutMs <number>", "Request timeout in milliseconds", String(env.TIMEOUT_MS))
  .option("--concurrency <number>", "Number of concurrent requests")
  .action(async (url: string, options: CliOptions) => {
    try {
      const config = SiteAuditConfigSchema.parse({
        url,
        maxPages: toInt(options.pages),
        timeoutMs: toInt(options.timeoutMs),
        concurrency: toInt(options.concurrency),
        userAgent: env.USER_AGENT,
        keywords: options.keywords ?? [],
        ai: options.ai ?? false,
      });

      progress(`Analyzing ${config.url} (up to ${config.maxPages} pages)...`);
      if (config.keywords.length > 0) {
        progress(`Checking rankings for: ${config.keywords.join(", ")}`);
      }

      const report = await runSiteAudit(config, createAuditServices(env));
      progress(`Analyzed ${report.audit.summary.totalPages} pages in ${report.crawl.durationMs}ms`);

      if (options.output === "json" || options.output === "csv") {
        const write = options.output === "csv" ? writeCsvReport : writeJsonReport;
        const filepath = await write(report, env.OUTPUT_DIR);
        progress(`Results saved to: ${filepath}`);
        console.log(filepath);
      } else {
        console.log(formatConsoleReport(report));
      }

      process.exit(0);
    } catch (error) {
      console.error(
        JSON.stringify(
          {
            error: true,
            message: error instanceof Error && error.message ? error.message : "Unknown error occurred",
          },
          null,
          2
        )
      );
      process.exit(1);
    }
  });

program.parse();
