/**
 * Tests for the forward-only markup reader
 */

import { FormatError } from '../../errors/index.js';
import { int32Converter } from '../../converters/index.js';
import { MarkupReader } from '../reader.js';

describe('MarkupReader', () => {
  describe('sources', () => {
    it('should decode UTF-8 split across chunks', async () => {
      const bytes = new TextEncoder().encode('<a>café</a>');
      const cut = bytes.indexOf(0xc3) + 1;
      const reader = MarkupReader.fromChunks([bytes.slice(0, cut), bytes.slice(cut)]);

      await reader.advanceToDocumentElement('a');
      expect(await reader.readElementContentAsString()).toBe('café');
      expect(reader.isEOF).toBe(true);
    });

    it('should read from async chunks', async () => {
      async function* chunks(): AsyncGenerator<string> {
        yield '<count>4';
        yield '2</count>';
      }
      const reader = MarkupReader.fromChunks(chunks());

      await reader.advanceToDocumentElement();
      expect(await reader.readElementContent(int32Converter)).toBe(42);
    });

    it('should cancel a stream on close', async () => {
      const cancel = vi.fn();
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('<feed><title>t</title>'));
        },
        cancel,
      });
      const reader = MarkupReader.fromStream(stream);

      await reader.advanceToDocumentElement('feed');
      await reader.close();

      expect(cancel).toHaveBeenCalledTimes(1);
      await expect(reader.read()).rejects.toThrow(FormatError);
    });
  });

  describe('advanceToDocumentElement', () => {
    it('should return false for an empty document', async () => {
      const reader = MarkupReader.fromString('<?xml version="1.0"?>\n');
      expect(await reader.advanceToDocumentElement('feed')).toBe(false);
    });

    it('should reject another root element', async () => {
      const reader = MarkupReader.fromString('<entry/>');
      await expect(reader.advanceToDocumentElement('feed')).rejects.toThrow('Expected <feed>, but found <entry>');
    });
  });

  describe('element content', () => {
    it('should read an empty element as empty text', async () => {
      const reader = MarkupReader.fromString('<a><b/><c>x</c></a>');
      await reader.advanceToDocumentElement();
      await reader.read();

      expect(await reader.readElementContentAsString()).toBe('');
      expect(reader.name).toBe('c');
      expect(await reader.readElementContentAsString()).toBe('x');
      expect(reader.nodeKind).toBe('end-element');
    });

    it('should name the element in conversion errors', async () => {
      const reader = MarkupReader.fromString('<count>many</count>');
      await reader.advanceToDocumentElement();
      await expect(reader.readElementContent(int32Converter)).rejects.toThrow(
        "Cannot convert 'many' to int32 (count)"
      );
    });

    it('should require attributes', async () => {
      const reader = MarkupReader.fromString('<link href="/a"/>');
      await reader.advanceToDocumentElement();

      expect(reader.requireAttribute('href')).toBe('/a');
      expect(reader.getAttribute('rel')).toBeUndefined();
      expect(() => reader.requireAttribute('rel')).toThrow("Missing required attribute 'rel' on <link>");
    });

    it('should return empty text when the cursor is not on text', async () => {
      const reader = MarkupReader.fromString('<a><b/></a>');
      await reader.advanceToDocumentElement();
      expect(await reader.readContentAsString()).toBe('');
      expect(reader.name).toBe('a');
    });
  });

  describe('readEachDescendant', () => {
    it('should visit each matching child and stop at the parent end tag', async () => {
      const reader = MarkupReader.fromString(
        '<fieldOrder><field>_raw</field><field>host</field></fieldOrder>'
      );
      await reader.advanceToDocumentElement();
      const names: string[] = [];

      await reader.readEachDescendant('field', async (r) => {
        await r.read();
        names.push(await r.readContentAsString());
      });

      expect(names).toEqual(['_raw', 'host']);
      reader.ensureMarkup('end-element', 'fieldOrder');
    });

    it('should skip children the action leaves untouched', async () => {
      const reader = MarkupReader.fromString('<m><msg type="a"><x>1</x></msg><msg type="b"/></m>');
      await reader.advanceToDocumentElement();
      const types: string[] = [];

      await reader.readEachDescendant('msg', async (r) => {
        types.push(r.requireAttribute('type'));
      });

      expect(types).toEqual(['a', 'b']);
      expect(reader.nodeKind).toBe('end-element');
      expect(reader.name).toBe('m');
    });

    it('should finish children the action leaves midway', async () => {
      const reader = MarkupReader.fromString('<m><v><a>1</a><b>2</b></v><v><a>3</a></v></m>');
      await reader.advanceToDocumentElement();
      const firsts: string[] = [];

      await reader.readEachDescendant('v', async (r) => {
        await r.read();
        firsts.push(await r.readElementContentAsString());
      });

      expect(firsts).toEqual(['1', '3']);
      reader.ensureMarkup('end-element', 'm');
    });

    it('should move past an empty parent', async () => {
      const reader = MarkupReader.fromString('<r><m/><after/></r>');
      await reader.advanceToDocumentElement();
      await reader.read();

      await reader.readEachDescendant('msg', async () => {});
      expect(reader.name).toBe('after');
    });
  });

  describe('navigation', () => {
    it('should skip an element with its subtree', async () => {
      const reader = MarkupReader.fromString('<r><a><b><c/></b></a><d/></r>');
      await reader.advanceToDocumentElement();
      await reader.read();

      await reader.skip();
      expect(reader.name).toBe('d');
    });

    it('should consume a run of end tags', async () => {
      const reader = MarkupReader.fromString('<a><b><c/></b></a>');
      await reader.advanceToDocumentElement();
      await reader.read();
      await reader.read();
      await reader.read();

      await reader.readEndElementSequence('b', 'a');
      expect(reader.isEOF).toBe(true);
    });

    it('should report the markup it found', async () => {
      const reader = MarkupReader.fromString('<a>some text</a>');
      await reader.advanceToDocumentElement();
      await reader.read();

      expect(() => reader.ensureMarkup('end-element', 'a')).toThrow("Expected </a>, but found text 'some text'");
    });

    it('should fail on a truncated document', async () => {
      const reader = MarkupReader.fromString('<feed><title>t');
      await reader.advanceToDocumentElement();
      await expect(reader.skip()).rejects.toThrow(FormatError);
    });
  });
});
