/**
 * Field Extractor
 *
 * Maps the Work node of a located RDF block onto the flat `MetadataFields`
 * model. Once a Work node exists nothing here fails: absent leaves read as
 * empty strings.
 */

import { SvgMetadataError } from './errors.js';
import {
  AGENT_ALIASES, ATTR_ABOUT, ATTR_RESOURCE, BAG_ALIASES,
  DC_CREATOR, DC_DATE, DC_DESCRIPTION, DC_LANGUAGE, DC_PUBLISHER,
  DC_RIGHTS, DC_SUBJECT, DC_TITLE, DEFAULT_LANGUAGE, LICENSE_ALIASES,
  LIST_ITEM_ALIASES, UNSORTED_KEYWORD, WORK_ALIASES,
} from './vocabulary.js';
import { ExtractedMetadata, MetadataField, MetadataFields, XmlElement } from './types.js';
import { attributeOf, contentOf, findChild, findChildren } from './xml.js';

/** Name and URL of a creator, owner or publisher */
interface AgentValue {
  name: string;
  url: string;
}

export const METADATA_FIELD_NAMES: readonly MetadataField[] = [
  'title', 'description', 'subject',
  'creator', 'creatorUrl', 'owner', 'ownerUrl', 'publisher', 'publisherUrl',
  'license', 'licenseDate', 'language', 'date', 'aboutUrl',
];

export function emptyFields(): MetadataFields {
  return {
    title: '',
    description: '',
    subject: '',
    creator: '',
    creatorUrl: '',
    owner: '',
    ownerUrl: '',
    publisher: '',
    publisherUrl: '',
    license: '',
    licenseDate: '',
    language: DEFAULT_LANGUAGE,
    date: '',
    aboutUrl: '',
  };
}

/**
 * Extract every field from an RDF root.
 *
 * @throws SvgMetadataError `MissingWorkElement` when the RDF root holds no Work node
 */
export function extractWork(rdf: XmlElement): ExtractedMetadata {
  const work = findChild(rdf, WORK_ALIASES);
  if (!work) {
    throw new SvgMetadataError('MissingWorkElement', `No Work element found in <${rdf.name}>`);
  }

  const creator = readAgent(findChild(work, [DC_CREATOR]));
  const owner = readAgent(findChild(work, [DC_RIGHTS]));
  const publisher = readAgent(findChild(work, [DC_PUBLISHER]));
  const license = findChild(work, LICENSE_ALIASES);
  const subject = findChild(work, [DC_SUBJECT]);
  const bagItems = readBag(subject);
  const language = contentOf(findChild(work, [DC_LANGUAGE]));

  const fields: MetadataFields = {
    title: contentOf(findChild(work, [DC_TITLE])),
    description: contentOf(findChild(work, [DC_DESCRIPTION])),
    subject: bagItems ? '' : contentOf(subject),
    creator: creator.name,
    creatorUrl: creator.url,
    owner: owner.name,
    ownerUrl: owner.url,
    publisher: publisher.name,
    publisherUrl: publisher.url,
    license: attributeOf(license, ATTR_RESOURCE),
    licenseDate: contentOf(findChild(license, [DC_DATE])),
    language: language === '' ? DEFAULT_LANGUAGE : language,
    date: contentOf(findChild(work, [DC_DATE])),
    aboutUrl: attributeOf(work, ATTR_ABOUT),
  };

  return {
    fields: applyAgentDefaults(fields),
    keywords: bagItems ?? [UNSORTED_KEYWORD],
  };
}

/**
 * Agent fields accept either `<dc:creator><cc:Agent>…</cc:Agent></dc:creator>`
 * or the property element standing in for the Agent. A node without a
 * dc:title contributes its own text as the name.
 */
function readAgent(property: XmlElement | undefined): AgentValue {
  if (!property) return { name: '', url: '' };
  const agent = findChild(property, AGENT_ALIASES) ?? property;
  const title = findChild(agent, [DC_TITLE]);
  return {
    name: title ? contentOf(title) : contentOf(agent),
    url: attributeOf(agent, ATTR_ABOUT),
  };
}

/**
 * Keyword list of `dc:subject/rdf:Bag/rdf:li`, or undefined when the
 * subject carries no Bag with at least one non-empty item.
 */
function readBag(subject: XmlElement | undefined): string[] | undefined {
  const bag = findChild(subject, BAG_ALIASES);
  if (!bag) return undefined;
  const items = findChildren(bag, LIST_ITEM_ALIASES)
    .map(item => contentOf(item))
    .filter(item => item !== '');
  return items.length > 0 ? items : undefined;
}

/**
 * Fill empty creator/owner/publisher slots from their siblings. Names and
 * URLs are defaulted independently, forward first (creator → owner →
 * publisher), then backward (publisher → owner → creator).
 */
export function applyAgentDefaults(fields: MetadataFields): MetadataFields {
  const result = { ...fields };
  const fill = (target: MetadataField, source: MetadataField): void => {
    if (result[target] === '') result[target] = result[source];
  };

  fill('owner', 'creator');
  fill('publisher', 'owner');
  fill('owner', 'publisher');
  fill('creator', 'owner');

  fill('ownerUrl', 'creatorUrl');
  fill('publisherUrl', 'ownerUrl');
  fill('ownerUrl', 'publisherUrl');
  fill('creatorUrl', 'ownerUrl');

  return result;
}
