/**
 * RDF Serializer
 *
 * Renders metadata fields as an RDF/XML fragment suitable for an SVG
 * `<metadata>` element. Values are placed into an element tree and escaped
 * when the tree is printed, so metadata text cannot break out of its element.
 */

import { licenseBlock, normalizeLicense } from './licenses.js';
import {
  ATTR_ABOUT, ATTR_RESOURCE, CC_NAMESPACE, DC_CREATOR, DC_DATE,
  DC_DESCRIPTION, DC_FORMAT, DC_LANGUAGE, DC_NAMESPACE, DC_PUBLISHER,
  DC_RIGHTS, DC_SUBJECT, DC_TITLE, DC_TYPE, DEFAULT_LANGUAGE,
  RDF_NAMESPACE, STILL_IMAGE_TYPE, SVG_MEDIA_TYPE,
} from './vocabulary.js';
import { MetadataFields, XmlElement } from './types.js';
import { element, renderXml } from './xml.js';

function agent(property: string, name: string, url: string): XmlElement {
  const attributes: Record<string, string> = url === '' ? {} : { [ATTR_ABOUT]: url };
  return element(property, {}, [
    element('Agent', attributes, [element(DC_TITLE, {}, [name])]),
  ]);
}

/** Build the rdf:RDF element tree for a set of fields and keywords */
export function buildRdf(fields: MetadataFields, keywords: Iterable<string>): XmlElement {
  const license = normalizeLicense(fields.license);
  const language = fields.language === '' ? DEFAULT_LANGUAGE : fields.language;

  const work = element('Work', { [ATTR_ABOUT]: fields.aboutUrl }, [
    element(DC_TITLE, {}, [fields.title]),
    element(DC_DESCRIPTION, {}, [fields.description]),
    element(DC_SUBJECT, {}, [
      element('rdf:Bag', {}, [...keywords].map(keyword => element('rdf:li', {}, [keyword]))),
    ]),
    agent(DC_PUBLISHER, fields.publisher, fields.publisherUrl),
    agent(DC_CREATOR, fields.creator, fields.creatorUrl),
    agent(DC_RIGHTS, fields.owner, fields.ownerUrl),
    element(DC_DATE, {}, [fields.date]),
    element(DC_FORMAT, {}, [SVG_MEDIA_TYPE]),
    element(DC_TYPE, { [ATTR_RESOURCE]: STILL_IMAGE_TYPE }),
    element('license', { [ATTR_RESOURCE]: license }, [
      element(DC_DATE, {}, [fields.licenseDate]),
    ]),
    element(DC_LANGUAGE, {}, [language]),
  ]);

  const rights = licenseBlock(license);

  return element(
    'rdf:RDF',
    {
      xmlns: CC_NAMESPACE,
      'xmlns:dc': DC_NAMESPACE,
      'xmlns:rdf': RDF_NAMESPACE,
    },
    rights ? [work, rights] : [work]
  );
}

/**
 * Serialize fields and keywords as RDF/XML text.
 *
 * @example
 * ```ts
 * const rdf = toRdf({ ...emptyFields(), title: 'Apple', license: 'Public Domain' }, ['Fruit']);
 * ```
 */
export function toRdf(fields: MetadataFields, keywords: Iterable<string>): string {
  return renderXml(buildRdf(fields, keywords));
}
