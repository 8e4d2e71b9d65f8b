import { buildRdf, toRdf } from '../src/serializer';
import { emptyFields } from '../src/extractor';
import { CC_BY, CC_BY_NC_SA, PUBLIC_DOMAIN_LABEL, PUBLIC_DOMAIN_URI } from '../src/licenses';
import { SvgMetadata } from '../src/metadata';
import { childElements } from '../src/xml';

describe('toRdf', () => {
  it('renders the full Work and License blocks', () => {
    const fields = { ...emptyFields(), title: 'Apple', creator: 'Jane', license: CC_BY };

    expect(toRdf(fields, ['Fruit'])).toBe([
      '<rdf:RDF xmlns="http://web.resource.org/cc/" xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">',
      '  <Work rdf:about="">',
      '    <dc:title>Apple</dc:title>',
      '    <dc:description />',
      '    <dc:subject>',
      '      <rdf:Bag>',
      '        <rdf:li>Fruit</rdf:li>',
      '      </rdf:Bag>',
      '    </dc:subject>',
      '    <dc:publisher>',
      '      <Agent>',
      '        <dc:title />',
      '      </Agent>',
      '    </dc:publisher>',
      '    <dc:creator>',
      '      <Agent>',
      '        <dc:title>Jane</dc:title>',
      '      </Agent>',
      '    </dc:creator>',
      '    <dc:rights>',
      '      <Agent>',
      '        <dc:title />',
      '      </Agent>',
      '    </dc:rights>',
      '    <dc:date />',
      '    <dc:format>image/svg+xml</dc:format>',
      '    <dc:type rdf:resource="http://purl.org/dc/dcmitype/StillImage" />',
      '    <license rdf:resource="http://creativecommons.org/licenses/by/2.0/">',
      '      <dc:date />',
      '    </license>',
      '    <dc:language>en</dc:language>',
      '  </Work>',
      '  <License rdf:about="http://creativecommons.org/licenses/by/2.0/">',
      '    <permits rdf:resource="http://web.resource.org/cc/Reproduction" />',
      '    <permits rdf:resource="http://web.resource.org/cc/Distribution" />',
      '    <requires rdf:resource="http://web.resource.org/cc/Notice" />',
      '    <requires rdf:resource="http://web.resource.org/cc/Attribution" />',
      '    <permits rdf:resource="http://web.resource.org/cc/DerivativeWorks" />',
      '  </License>',
      '</rdf:RDF>',
      '',
    ].join('\n'));
  });

  it('escapes markup in field values', () => {
    const fields = { ...emptyFields(), title: `<b>"Tom" & 'Jerry'</b>` };
    expect(toRdf(fields, [])).toContain(
      '    <dc:title>&lt;b&gt;&quot;Tom&quot; &amp; &apos;Jerry&apos;&lt;/b&gt;</dc:title>\n'
    );
  });

  it('escapes markup in keywords and agent URLs', () => {
    const fields = { ...emptyFields(), creator: 'Jane', creatorUrl: 'http://example.org/?a=1&b=2' };
    const rdf = toRdf(fields, ['R&D']);
    expect(rdf).toContain('        <rdf:li>R&amp;D</rdf:li>\n');
    expect(rdf).toContain('      <Agent rdf:about="http://example.org/?a=1&amp;b=2">\n');
  });

  it('renders the public domain label and URI identically', () => {
    const byLabel = toRdf({ ...emptyFields(), license: PUBLIC_DOMAIN_LABEL }, []);
    const byUri = toRdf({ ...emptyFields(), license: PUBLIC_DOMAIN_URI }, []);
    expect(byLabel).toBe(byUri);
    expect(byLabel).toContain('    <license rdf:resource="http://web.resource.org/cc/PublicDomain">\n');
    expect(byLabel).toContain('  <License rdf:about="http://web.resource.org/cc/PublicDomain">\n');
  });

  it('writes a bare reference for unknown licenses', () => {
    const rdf = toRdf({ ...emptyFields(), license: 'http://example.org/my-license' }, []);
    expect(rdf).toContain('    <license rdf:resource="http://example.org/my-license">\n');
    expect(rdf).not.toContain('<License');
  });

  it('falls back to English for an empty language', () => {
    const rdf = toRdf({ ...emptyFields(), language: '' }, []);
    expect(rdf).toContain('    <dc:language>en</dc:language>\n');
  });

  it('writes a single-item Bag', () => {
    const rdf = toRdf(emptyFields(), ['only']);
    expect(rdf).toContain('      <rdf:Bag>\n        <rdf:li>only</rdf:li>\n      </rdf:Bag>\n');
  });
});

describe('buildRdf', () => {
  it('orders non-commercial rights before derivative works', () => {
    const tree = buildRdf({ ...emptyFields(), license: CC_BY_NC_SA }, []);
    const [, license] = childElements(tree);
    expect(childElements(license).map(right => `${right.name} ${right.attributes['rdf:resource']}`)).toEqual([
      'permits http://web.resource.org/cc/Reproduction',
      'permits http://web.resource.org/cc/Distribution',
      'requires http://web.resource.org/cc/Notice',
      'requires http://web.resource.org/cc/Attribution',
      'prohibits http://web.resource.org/cc/CommercialUse',
      'permits http://web.resource.org/cc/DerivativeWorks',
      'requires http://web.resource.org/cc/ShareAlike',
    ]);
  });
});

describe('RDF round trip', () => {
  it('reads back what it writes', () => {
    const original = new SvgMetadata({
      title: 'Apple',
      description: 'A & B',
      author: 'Jane',
      creatorUrl: 'http://example.org/people/jane',
      license: CC_BY,
      licenseDate: '2005',
      language: 'de',
      date: '2005-03-14',
      aboutUrl: 'http://example.org/apple.svg',
      keywords: ['Fruit', 'Food'],
    });

    const copy = new SvgMetadata();
    expect(copy.parseSync(original.toRdf())).toBe(true);

    expect(copy.title).toBe('Apple');
    expect(copy.description).toBe('A & B');
    expect(copy.creator).toBe('Jane');
    expect(copy.creatorUrl).toBe('http://example.org/people/jane');
    expect(copy.owner).toBe('Jane');
    expect(copy.publisher).toBe('Jane');
    expect(copy.license).toBe(CC_BY);
    expect(copy.licenseDate).toBe('2005');
    expect(copy.language).toBe('de');
    expect(copy.date).toBe('2005-03-14');
    expect(copy.aboutUrl).toBe('http://example.org/apple.svg');
    expect(copy.keywords).toEqual(['Fruit', 'Food']);
    expect(copy.compare(original)).toBe(true);
  });

  it('reads back an empty Bag as unsorted', () => {
    const copy = new SvgMetadata();
    expect(copy.parseSync(new SvgMetadata({ title: 'Bare' }).toRdf())).toBe(true);
    expect(copy.keywords).toEqual(['unsorted']);
  });

  it('keeps leading and trailing spaces in values', () => {
    const original = new SvgMetadata({ title: '  padded  ', author: ' Jane', keywords: [' Fruit '] });
    expect(original.toRdf()).toContain('<dc:title>  padded  </dc:title>');

    const copy = new SvgMetadata();
    expect(copy.parseSync(original.toRdf())).toBe(true);
    expect(copy.title).toBe('  padded  ');
    expect(copy.creator).toBe(' Jane');
    expect(copy.keywords).toEqual([' Fruit ']);
    expect(copy.compare(original)).toBe(true);
  });
});
