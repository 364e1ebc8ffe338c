/**
 * Frontmatter Parser Tests
 */

import { ValidationError } from '../errors/errors';

import { splitFrontmatter, serializeFrontmatter, parseYamlMapping, isPlainObject } from './frontmatter-parser';

describe('frontmatter-parser', () => {
  describe('splitFrontmatter', () => {
    it('should split frontmatter from the body', () => {
      const doc = splitFrontmatter('---\nname: Intro\npublished: true\n---\n\n# Hello\n', 'intro.page/index.md');

      expect(doc.frontmatter).toEqual({ name: 'Intro', published: true });
      expect(doc.body).toBe('# Hello\n');
    });

    it('should treat text without frontmatter as body', () => {
      const doc = splitFrontmatter('# Just text', 'x.md');
      expect(doc).toEqual({ frontmatter: {}, body: '# Just text' });
    });

    it('should accept CRLF line endings and a BOM', () => {
      const doc = splitFrontmatter('\uFEFF---\r\nname: A\r\n---\r\nbody', 'x.md');
      expect(doc.frontmatter).toEqual({ name: 'A' });
      expect(doc.body).toBe('body');
    });

    it('should reject an unclosed block', () => {
      expect(() => splitFrontmatter('---\nname: A\n', 'x.md')).toThrow(ValidationError);
    });

    it('should reject malformed YAML with the source path attached', () => {
      let caught: unknown;
      try {
        splitFrontmatter('---\nname: [unclosed\n---\n', 'broken.page/index.md');
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ValidationError);
      if (caught instanceof ValidationError) {
        expect(caught.sourcePath).toBe('broken.page/index.md');
      }
    });
  });

  describe('parseYamlMapping', () => {
    it('should reject a top-level list', () => {
      expect(() => parseYamlMapping('- a\n- b', 'list.yaml')).toThrow('Expected a YAML mapping in list.yaml');
    });

    it('should return an empty mapping for an empty document', () => {
      expect(parseYamlMapping('', 'empty.yaml')).toEqual({});
    });
  });

  describe('serializeFrontmatter', () => {
    it('should write a frontmatter block and drop undefined values', () => {
      const text = serializeFrontmatter({ name: 'Intro', position: undefined, published: false }, 'Body text\n\n');
      expect(text).toBe('---\nname: Intro\npublished: false\n---\n\nBody text\n');
    });

    it('should round trip through splitFrontmatter', () => {
      const text = serializeFrontmatter({ name: 'Quiz: One', modules: ['Week 1'] }, 'Read ch.1');
      expect(splitFrontmatter(text, 'x.md')).toEqual({
        frontmatter: { name: 'Quiz: One', modules: ['Week 1'] },
        body: 'Read ch.1\n',
      });
    });
  });

  describe('isPlainObject', () => {
    it('should exclude arrays, dates and null', () => {
      expect(isPlainObject({})).toBe(true);
      expect(isPlainObject([])).toBe(false);
      expect(isPlainObject(new Date())).toBe(false);
      expect(isPlainObject(null)).toBe(false);
    });
  });
});
