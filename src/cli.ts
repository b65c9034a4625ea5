#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { CsvLeadSink } from './adapters/csvSink';
import { runWithConfig } from './core/adapterFactory';
import { fromEnv, loadConfigFile, mergeLayers, normalizeConfig, RawConfig } from './core/config';
import { ConfigValidationError, PipelineError } from './core/errors';
import { log } from './utils/logger';

interface CliOptions {
  config?: string;
  address?: string;
  radius?: string;
  minRatings?: string;
  keywords?: string;
  pages?: string;
  output?: string;
}

export const optionsToRaw = (opts: CliOptions): RawConfig => ({
  baseAddress: opts.address,
  searchRadiusMiles: opts.radius,
  minRatingsSource: opts.minRatings,
  searchKeywords: opts.keywords,
  pageLimit: opts.pages,
  outputFile: opts.output,
});

export const buildProgram = (): Command =>
  new Command()
    .name('restaurant-leads')
    .description('Find restaurants near an address on Google Maps and export qualified leads to CSV')
    .option('-c, --config <file>', 'JSON config file; takes the snake_case keys of the old config.yaml (base_address, google_maps_api_key, ...) but not YAML')
    .option('-a, --address <address>', 'base address to search around')
    .option('-r, --radius <miles>', 'search radius in miles')
    .option('-m, --min-ratings <n>', 'minimum number of ratings')
    .option('-k, --keywords <list>', 'comma separated search keywords')
    .option('-p, --pages <n>', 'max result pages per keyword')
    .option('-o, --output <file>', 'CSV output file');

export const main = async (argv: string[]): Promise<number> => {
  const opts = buildProgram().parse(argv).opts<CliOptions>();

  try {
    const fileLayer = opts.config ? await loadConfigFile(opts.config) : {};
    const config = normalizeConfig(mergeLayers(fromEnv(), fileLayer, optionsToRaw(opts)));

    log('INFO', `Searching around ${config.baseAddress} (radius ${config.radiusMiles} mi, min ${config.minRatings} ratings)`, {
      keywords: config.keywords.length ? config.keywords : '(none)',
    });

    const result = await runWithConfig(config);

    if (result.outcome === 'no-candidates') {
      log('WARN', 'No restaurants were returned by Google Maps for any keyword.');
      return 0;
    }
    if (result.outcome === 'no-qualified-leads') {
      log('INFO', `Scraped ${result.uniqueCandidates} unique restaurants but none matched the filtering criteria.`);
      return 0;
    }

    await new CsvLeadSink(config.outputFile).save(result.leads);
    log('INFO', 'Lead generation process completed.');
    return 0;
  } catch (error) {
    if (error instanceof ConfigValidationError || error instanceof PipelineError) {
      log('ERROR', `Critical: ${error.message}. Exiting.`);
      return 1;
    }
    log('ERROR', 'lead generation failed', error instanceof Error ? error.message : error);
    return 2;
  }
};

if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      log('ERROR', 'unexpected failure', error);
      process.exitCode = 2;
    });
}
