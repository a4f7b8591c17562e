import type { RoutingDocument } from '../portio.js';
import type { RegisterDocument } from '../svd.js';
import { type ExtractOptions, applyRegisterDocument } from './register_model.js';
import { applyRoutingDocument } from './routing.js';
import type { DbusModel } from './types.js';

export interface VariantDocuments {
  variant: string;
  registerDocuments: RegisterDocument[];
  routingDocuments: RoutingDocument[];
}

/** Register descriptions first, so routing lookups see every signal the variant defines. */
export function applyVariant(model: DbusModel, documents: VariantDocuments, options: ExtractOptions): void {
  for (const doc of documents.registerDocuments) {
    applyRegisterDocument(model, doc, options);
  }
  for (const doc of documents.routingDocuments) {
    applyRoutingDocument(model, doc, options.reporter);
  }
}
