import path from 'node:path';

import type { Reporter } from '../diagnostics.js';
import { listFiles } from '../io.js';
import { type RoutingDocument, readPortioFile } from '../portio.js';
import { type RegisterDocument, readSvdFile } from '../svd.js';
import { describeSource } from '../xml.js';
import { type VariantDocuments, applyVariant } from './aggregate.js';
import { type ExtractOptions, GPIO_ROUTING_PERIPHERAL } from './register_model.js';
import { type DbusModel, createModel } from './types.js';

// Layout of the extracted device packs and pin tool data below the work directory.

export function registerDocumentsDir(workdir: string, variant: string): string {
  return path.join(workdir, 'pack', variant, 'SVD', variant.toUpperCase());
}

export function routingDocumentsDir(workdir: string, variant: string): string {
  return path.join(workdir, 'pin_tool', 'platform', 'hwconf_data', 'pin_tool', variant);
}

export async function loadVariantDocuments(
  workdir: string,
  variant: string,
  reporter: Reporter
): Promise<VariantDocuments> {
  const svdDir = registerDocumentsDir(workdir, variant);
  const svdFiles = await listFiles(svdDir, '*.svd');
  if (svdFiles.length === 0) {
    throw new Error(`No register descriptions for ${variant} in ${describeSource(svdDir)}`);
  }

  const portioDir = routingDocumentsDir(workdir, variant);
  const portioFiles = await listFiles(portioDir, '*/PORTIO.portio');
  if (portioFiles.length === 0) {
    throw new Error(`No pin routing data for ${variant} in ${describeSource(portioDir)}`);
  }

  const registerDocuments: RegisterDocument[] = [];
  for (const file of svdFiles) {
    reporter.info(`Parsing SVD for ${path.basename(file, '.svd')}`);
    registerDocuments.push(await readSvdFile(file, [GPIO_ROUTING_PERIPHERAL]));
  }

  const routingDocuments: RoutingDocument[] = [];
  for (const file of portioFiles) {
    reporter.info(`Parsing Pin Tool for ${path.basename(path.dirname(file))}`);
    routingDocuments.push(await readPortioFile(file));
  }

  return { variant, registerDocuments, routingDocuments };
}

/** Load and merge each variant in turn; variant order decides which value is kept first. */
export async function buildFamilyModel(
  workdir: string,
  variants: string[],
  options: ExtractOptions
): Promise<DbusModel> {
  const model = createModel();
  for (const variant of variants) {
    const documents = await loadVariantDocuments(workdir, variant, options.reporter);
    applyVariant(model, documents, options);
  }
  return model;
}
