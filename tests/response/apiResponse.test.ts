import { CoercionError, ConfigurationError, MissingParameterError } from '../../src/errors';
import { ABSENT, isAbsent } from '../../src/mapping/absent';
import { parseXmlDocument } from '../../src/parsers/xmlParser';
import { ApiResponse, isResponseClass, parseResponse } from '../../src/response/apiResponse';

class Photo extends ApiResponse {}
Photo.attribute('id', { type: 'integer' }).attribute('title');

class PhotoList extends ApiResponse {}
PhotoList.attribute('stat', { required: true }).collection('photos', Photo, { path: 'photo' });

const PHOTOS_XML = '<photos stat="ok"><photo id="1" title="A"/><photo id="2" title="B"/></photos>';

describe('ApiResponse', () => {
  describe('photo list', () => {
    test('should read the root attribute and the ordered collection', () => {
      const response = PhotoList.fromXml(PHOTOS_XML);
      const photos = response.collection('photos', Photo);

      expect(response.get('stat')).toBe('ok');
      expect(photos).toHaveLength(2);
      expect(photos.map((photo) => [photo.get('id'), photo.get('title')])).toEqual([
        [1, 'A'],
        [2, 'B'],
      ]);
    });

    test('should build members as instances of the collection class', () => {
      const photos = PhotoList.fromXml(PHOTOS_XML).get('photos');

      expect(Array.isArray(photos)).toBe(true);
      expect(photos).toEqual([expect.any(Photo), expect.any(Photo)]);
    });

    test('should allow iterating a collection more than once', () => {
      const photos = PhotoList.fromXml(PHOTOS_XML).collection('photos', Photo);
      const first = [...photos].map((photo) => photo.integer('id'));
      const second = [...photos].map((photo) => photo.integer('id'));

      expect(first).toEqual([1, 2]);
      expect(second).toEqual(first);
    });

    test('should return the same value on repeated reads', () => {
      const response = PhotoList.fromXml(PHOTOS_XML);

      expect(response.get('photos')).toBe(response.get('photos'));
      expect(response.get('stat')).toBe(response.get('stat'));
    });

    test('should resolve a collection without matches to an empty list', () => {
      const response = PhotoList.fromXml('<photos stat="ok"/>');
      const photos = response.get('photos');

      expect(photos).toEqual([]);
      expect(isAbsent(photos)).toBe(false);
      expect([...response.collection('photos', Photo)]).toEqual([]);
    });

    test('should raise for a missing required value only when it is read', () => {
      const response = PhotoList.fromXml('<photos><photo id="1"/></photos>');

      expect(response.collection('photos', Photo)).toHaveLength(1);
      expect(() => response.get('stat')).toThrow(MissingParameterError);
      expect(() => response.get('stat')).toThrow('[stat] Required value not found at "stat"');
    });

    test('should produce a plain object of present values', () => {
      const response = PhotoList.fromXml('<photos stat="ok"><photo id="1" title="A"/><photo id="2"/></photos>');

      expect(response.toObject()).toEqual({
        stat: 'ok',
        photos: [{ id: 1, title: 'A' }, { id: 2 }],
      });
    });
  });

  describe('absent values', () => {
    class Counter extends ApiResponse {}
    Counter.attribute('count', { type: 'integer' })
      .attribute('flag', { type: 'boolean' })
      .attribute('label');

    test('should resolve a missing attribute to ABSENT', () => {
      const response = Counter.fromXml('<counter/>');

      expect(response.get('count')).toBe(ABSENT);
      expect(response.get('flag')).toBe(ABSENT);
      expect(response.get('label')).toBe(ABSENT);
    });

    test('should keep falsy values apart from ABSENT', () => {
      const response = Counter.fromXml('<counter count="0" flag="false" label=""/>');

      expect(response.get('count')).toBe(0);
      expect(response.get('flag')).toBe(false);
      expect(response.get('label')).toBe('');
      expect(isAbsent(response.get('count'))).toBe(false);
    });

    test('should return ABSENT for undeclared names', () => {
      expect(Counter.fromXml('<counter count="3"/>').get('other')).toBe(ABSENT);
    });
  });

  describe('elements and paths', () => {
    class Profile extends ApiResponse {}
    Profile.element('name')
      .element('age', { type: 'integer' })
      .element('city', { path: 'address/city' })
      .attribute('zip', { path: 'address/@zip' })
      .element('joined', { type: 'date' })
      .element('score', { type: 'float' })
      .element('active', { type: 'boolean' })
      .element('nickname');

    const xml = `
      <profile>
        <name> Ada </name>
        <age>36</age>
        <address zip="12345"><city>London</city></address>
        <joined>2020-01-15</joined>
        <score>9.5</score>
        <active>yes</active>
        <nickname/>
      </profile>
    `;

    test('should read trimmed element text coerced to its type', () => {
      const response = Profile.fromXml(xml);

      expect(response.string('name')).toBe('Ada');
      expect(response.integer('age')).toBe(36);
      expect(response.date('joined')).toEqual(new Date(Date.UTC(2020, 0, 15)));
      expect(response.float('score')).toBe(9.5);
      expect(response.boolean('active')).toBe(true);
    });

    test('should follow nested paths for elements and attributes', () => {
      const response = Profile.fromXml(xml);

      expect(response.get('city')).toBe('London');
      expect(response.get('zip')).toBe('12345');
    });

    test('should treat an empty element as absent', () => {
      expect(Profile.fromXml(xml).get('nickname')).toBe(ABSENT);
    });

    test('should resolve paths starting with a slash from the document root', () => {
      class Item extends ApiResponse {}
      Item.attribute('id').attribute('stat', { path: '/rsp/@stat' }).attribute('other', { path: '/other/@stat' });

      class Envelope extends ApiResponse {}
      Envelope.collection('items', Item, { path: 'items/item' });

      const response = Envelope.fromXml('<rsp stat="ok"><items><item id="a"/><item id="b"/></items></rsp>');
      const items = response.collection('items', Item);

      expect(items.map((item) => item.get('id'))).toEqual(['a', 'b']);
      expect(items[1].get('stat')).toBe('ok');
      expect(items[1].get('other')).toBe(ABSENT);
      expect(items[1].root.name).toBe('item');
      expect(items[1].document).toBe(response.root);
    });
  });

  describe('coercion failures', () => {
    test('should name the parameter on read and not on parse', () => {
      const response = Photo.fromXml('<photo id="abc"/>');

      expect(() => response.get('id')).toThrow(CoercionError);
      expect(() => response.get('id')).toThrow('[id] Cannot read "abc" as integer');
      expect(response.get('title')).toBe(ABSENT);
    });
  });

  describe('declarations', () => {
    class Base extends ApiResponse {}
    Base.attribute('tags');

    class Counted extends Base {}
    Counted.element('tags', { type: 'integer', path: 'count' });

    test('should replace a parent declaration in the subclass only', () => {
      expect(Counted.declarations().get('tags')).toEqual({
        name: 'tags',
        type: 'integer',
        kind: 'element',
        path: 'count',
        required: false,
      });
      expect(Base.declarations().get('tags')).toEqual({
        name: 'tags',
        type: 'string',
        kind: 'attribute',
        path: 'tags',
        required: false,
      });
    });

    test('should read through the effective declaration', () => {
      const root = parseXmlDocument('<x tags="t"><count>3</count></x>');

      expect(Base.parse(root).get('tags')).toBe('t');
      expect(Counted.parse(root).get('tags')).toBe(3);
      expect(parseResponse(Counted, root)).toBeInstanceOf(Counted);
    });

    test('should reject an attribute collection and an empty name', () => {
      class Broken extends ApiResponse {}

      expect(() => Broken.declare('items', { kind: 'attribute', collectionOf: Photo })).toThrow(ConfigurationError);
      expect(() => Broken.attribute('')).toThrow(ConfigurationError);
      expect(Broken.declarations().size).toBe(0);
    });

    test('should recognise response classes', () => {
      expect(isResponseClass(Photo)).toBe(true);
      expect(isResponseClass(ApiResponse)).toBe(true);
      expect(isResponseClass(class {})).toBe(false);
      expect(isResponseClass('Photo')).toBe(false);
    });
  });

  describe('typed readers', () => {
    test('should refuse a reader that does not match the declared type', () => {
      const response = PhotoList.fromXml(PHOTOS_XML);
      const photo = response.collection('photos', Photo)[0];

      expect(photo.integer('id')).toBe(1);
      expect(() => photo.string('id')).toThrow('[id] Declared as integer, read as string');
      expect(() => response.string('photos')).toThrow('[photos] Declared as collection of Photo, read as string');
      expect(() => photo.string('missing')).toThrow('[missing] Not declared on Photo');
      expect(() => response.collection('photos', PhotoList)).toThrow(ConfigurationError);
    });

    test('should return ABSENT from a typed reader when the value is missing', () => {
      expect(Photo.fromXml('<photo/>').integer('id')).toBe(ABSENT);
    });
  });

  describe('success predicate', () => {
    class Status extends ApiResponse {
      successful(): boolean {
        return this.string('stat') === 'ok';
      }
    }
    Status.attribute('stat');

    test('should default to true', () => {
      expect(PhotoList.fromXml('<photos/>').successful()).toBe(true);
    });

    test('should use the subclass convention', () => {
      expect(Status.fromXml('<rsp stat="ok"/>').successful()).toBe(true);
      expect(Status.fromXml('<rsp stat="fail"/>').successful()).toBe(false);
    });
  });
});
