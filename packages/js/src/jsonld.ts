/**
 * JSON-LD view of a Work
 *
 * Expresses the same Work/Agent shape as the RDF/XML serializer in compacted
 * JSON-LD, and hands it to jsonld.js when N-Quads are needed. The context is
 * inline so no document loader is ever consulted.
 */

import * as jsonld from 'jsonld';
import { normalizeLicense } from './licenses.js';
import { MetadataFields } from './types.js';
import {
  CC_NAMESPACE, DC_NAMESPACE, DEFAULT_LANGUAGE, RDF_NAMESPACE,
  STILL_IMAGE_TYPE, SVG_MEDIA_TYPE,
} from './vocabulary.js';

export type WorkContext = {
  cc: string;
  dc: string;
  rdf: string;
};

export type AgentNode = {
  '@type': string;
  '@id'?: string;
  'dc:title': string;
};

export type ResourceRef = {
  '@id': string;
};

/** Compacted JSON-LD document of a Work. Empty fields are left out. */
export type WorkDocument = {
  '@context': WorkContext;
  '@type': string;
  '@id'?: string;
  'dc:title'?: string;
  'dc:description'?: string;
  'dc:subject'?: string[];
  'dc:publisher'?: AgentNode;
  'dc:creator'?: AgentNode;
  'dc:rights'?: AgentNode;
  'dc:date'?: string;
  'dc:format': string;
  'dc:type': ResourceRef;
  'cc:license'?: ResourceRef;
  'dc:language': string;
};

export const WORK_CONTEXT: WorkContext = {
  cc: CC_NAMESPACE,
  dc: DC_NAMESPACE,
  rdf: RDF_NAMESPACE,
};

function agentNode(name: string, url: string): AgentNode | undefined {
  if (name === '' && url === '') return undefined;
  const node: AgentNode = { '@type': 'cc:Agent', 'dc:title': name };
  if (url !== '') node['@id'] = url;
  return node;
}

export function toJsonLd(fields: MetadataFields, keywords: Iterable<string>): WorkDocument {
  const doc: WorkDocument = {
    '@context': WORK_CONTEXT,
    '@type': 'cc:Work',
    'dc:format': SVG_MEDIA_TYPE,
    'dc:type': { '@id': STILL_IMAGE_TYPE },
    'dc:language': fields.language === '' ? DEFAULT_LANGUAGE : fields.language,
  };

  if (fields.aboutUrl !== '') doc['@id'] = fields.aboutUrl;
  if (fields.title !== '') doc['dc:title'] = fields.title;
  if (fields.description !== '') doc['dc:description'] = fields.description;
  if (fields.date !== '') doc['dc:date'] = fields.date;

  const subject = [...keywords];
  if (subject.length > 0) doc['dc:subject'] = subject;

  const publisher = agentNode(fields.publisher, fields.publisherUrl);
  if (publisher) doc['dc:publisher'] = publisher;
  const creator = agentNode(fields.creator, fields.creatorUrl);
  if (creator) doc['dc:creator'] = creator;
  const owner = agentNode(fields.owner, fields.ownerUrl);
  if (owner) doc['dc:rights'] = owner;

  if (fields.license !== '') doc['cc:license'] = { '@id': normalizeLicense(fields.license) };

  return doc;
}

/** N-Quads text for a Work document */
export async function toNQuads(doc: WorkDocument): Promise<string> {
  const quads: unknown = await jsonld.toRDF(doc, { format: 'application/n-quads' });
  if (typeof quads !== 'string') {
    throw new TypeError('jsonld.toRDF did not return N-Quads text');
  }
  return quads;
}
