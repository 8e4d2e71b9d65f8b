import { applyAgentDefaults, emptyFields, extractWork } from '../extractor.js';
import { XmlElement } from '../types.js';
import { element } from '../xml.js';

const work = (...children: XmlElement[]) =>
    element('rdf:RDF', {}, [element('cc:Work', { 'rdf:about': 'http://example.org/w' }, children)]);

describe('extractWork', () => {

    it('throws when the RDF root holds no Work', () => {
        expect(() => extractWork(element('rdf:RDF', {}, [element('rdf:Description')])))
            .toThrow('No Work element found in <rdf:RDF>');
    });

    it('reads an empty Work as empty fields', () => {
        const { fields, keywords } = extractWork(work());
        expect(fields).toEqual({ ...emptyFields(), aboutUrl: 'http://example.org/w' });
        expect(keywords).toEqual(['unsorted']);
    });

    it('accepts the ns: prefix', () => {
        const rdf = element('rdf:RDF', {}, [
            element('ns:Work', {}, [
                element('dc:title', {}, ['Prefixed']),
                element('ns:license', { 'rdf:resource': 'http://example.org/l' }),
            ]),
        ]);
        const { fields } = extractWork(rdf);
        expect(fields.title).toBe('Prefixed');
        expect(fields.license).toBe('http://example.org/l');
    });

    it('reads an agent given as plain text', () => {
        const { fields } = extractWork(work(element('dc:creator', {}, ['Jane'])));
        expect(fields.creator).toBe('Jane');
    });

    it('keeps leading and trailing spaces of values', () => {
        const { fields } = extractWork(work(element('dc:title', {}, ['  padded  '])));
        expect(fields.title).toBe('  padded  ');
    });

    it('reads an Agent without the property wrapper title', () => {
        const { fields } = extractWork(work(
            element('dc:publisher', {}, [element('Agent', { 'rdf:about': 'http://example.org/p' }, [
                element('dc:title', {}, ['Press']),
            ])]),
        ));
        expect(fields.publisher).toBe('Press');
        expect(fields.publisherUrl).toBe('http://example.org/p');
        expect(fields.owner).toBe('Press');
        expect(fields.creator).toBe('Press');
    });

    it('keeps subject text when there is no Bag', () => {
        const { fields, keywords } = extractWork(work(element('dc:subject', {}, ['fruit'])));
        expect(fields.subject).toBe('fruit');
        expect(keywords).toEqual(['unsorted']);
    });

    it('skips empty Bag items', () => {
        const { fields, keywords } = extractWork(work(
            element('dc:subject', {}, [element('rdf:Bag', {}, [
                element('rdf:li', {}, ['Fruit']),
                element('rdf:li'),
                element('rdf:li', {}, ['Food']),
            ])]),
        ));
        expect(keywords).toEqual(['Fruit', 'Food']);
        expect(fields.subject).toBe('');
    });

    it('treats a Bag without items as no keywords', () => {
        const { keywords } = extractWork(work(element('dc:subject', {}, [element('rdf:Bag')])));
        expect(keywords).toEqual(['unsorted']);
    });

    it('reads the license date from inside the license element', () => {
        const { fields } = extractWork(work(
            element('dc:date', {}, ['2004-01-01']),
            element('cc:license', { 'rdf:resource': 'http://example.org/l' }, [element('dc:date', {}, ['2005'])]),
        ));
        expect(fields.date).toBe('2004-01-01');
        expect(fields.licenseDate).toBe('2005');
    });

    it('ignores nested text when reading a scalar', () => {
        const { fields } = extractWork(work(element('dc:title', {}, ['Outer', element('span', {}, ['Inner'])])));
        expect(fields.title).toBe('Outer');
    });
});

describe('applyAgentDefaults', () => {

    it('fills owner and publisher from creator', () => {
        const fields = applyAgentDefaults({ ...emptyFields(), creator: 'C', creatorUrl: 'http://c' });
        expect([fields.creator, fields.owner, fields.publisher]).toEqual(['C', 'C', 'C']);
        expect([fields.creatorUrl, fields.ownerUrl, fields.publisherUrl]).toEqual(['http://c', 'http://c', 'http://c']);
    });

    it('fills owner and creator from publisher', () => {
        const fields = applyAgentDefaults({ ...emptyFields(), publisher: 'P' });
        expect([fields.creator, fields.owner, fields.publisher]).toEqual(['P', 'P', 'P']);
    });

    it('prefers creator over publisher for the owner', () => {
        const fields = applyAgentDefaults({ ...emptyFields(), creator: 'C', publisher: 'P' });
        expect([fields.creator, fields.owner, fields.publisher]).toEqual(['C', 'C', 'P']);
    });

    it('defaults names and URLs independently', () => {
        const fields = applyAgentDefaults({ ...emptyFields(), creator: 'C', ownerUrl: 'http://o' });
        expect(fields.owner).toBe('C');
        expect(fields.ownerUrl).toBe('http://o');
        expect(fields.creatorUrl).toBe('http://o');
        expect(fields.publisherUrl).toBe('http://o');
    });

    it('does not modify its input', () => {
        const input = { ...emptyFields(), creator: 'C' };
        applyAgentDefaults(input);
        expect(input.owner).toBe('');
    });
});
