/**
 * Tests for Atom feed and entry parsing
 */

import { FormatError } from '../../errors/index.js';
import { MIN_TIMESTAMP } from '../../converters/index.js';
import { getScalar, toPlainValue } from '../../value/index.js';
import { AtomEntry, AtomFeed, MessageType, Pagination } from '../index.js';

const APPS_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom" xmlns:s="http://dev.splunk.com/ns/rest" xmlns:opensearch="http://a9.com/-/spec/opensearch/1.1/">
  <title>localapps</title>
  <id>https://localhost:8089/services/apps/local</id>
  <updated>2014-03-18T14:42:58-07:00</updated>
  <generator build="182037" version="6.0.3"/>
  <author>
    <name>Splunk</name>
  </author>
  <link href="/services/apps/local/_new" rel="create"/>
  <opensearch:totalResults>1</opensearch:totalResults>
  <opensearch:itemsPerPage>30</opensearch:itemsPerPage>
  <opensearch:startIndex>0</opensearch:startIndex>
  <s:messages/>
  <entry>
    <title>search</title>
    <id>https://localhost:8089/servicesNS/nobody/system/apps/local/search</id>
    <updated>2014-03-18T14:42:58-07:00</updated>
    <link href="/servicesNS/nobody/system/apps/local/search" rel="alternate"/>
    <author>
      <name>system</name>
    </author>
    <link href="/servicesNS/nobody/system/apps/local/search" rel="list"/>
    <content type="text/xml">
      <s:dict>
        <s:key name="check_for_updates">1</s:key>
        <s:key name="disabled">0</s:key>
        <s:key name="eai:acl">
          <s:dict>
            <s:key name="app">system</s:key>
            <s:key name="owner">nobody</s:key>
            <s:key name="perms">
              <s:dict>
                <s:key name="read">
                  <s:list>
                    <s:item>*</s:item>
                  </s:list>
                </s:key>
                <s:key name="write">
                  <s:list>
                    <s:item>admin</s:item>
                    <s:item>power</s:item>
                  </s:list>
                </s:key>
              </s:dict>
            </s:key>
          </s:dict>
        </s:key>
        <s:key name="label">Search &amp; Reporting</s:key>
        <s:key name="version">6.0.3</s:key>
        <s:key name="visible">1</s:key>
      </s:dict>
    </content>
  </entry>
</feed>`;

function entryWithContent(content: string): string {
  return `<entry xmlns:s="http://dev.splunk.com/ns/rest">
    <title>scheduled</title>
    <content type="text/xml">${content}</content>
  </entry>`;
}

describe('AtomFeed', () => {
  describe('parse', () => {
    it('should read the feed header', async () => {
      const feed = await AtomFeed.parse(APPS_FEED);

      expect(feed.title).toBe('localapps');
      expect(feed.id).toBe('https://localhost:8089/services/apps/local');
      expect(feed.author).toBe('Splunk');
      expect(feed.updated.toISOString()).toBe('2014-03-18T21:42:58.000Z');
      expect(feed.generatorVersion?.toString()).toBe('6.0.3');
      expect(feed.links.get('create')).toBe('/services/apps/local/_new');
      expect(feed.pagination).toEqual(new Pagination(30, 0, 1));
      expect(feed.messages).toEqual([]);
    });

    it('should read entries with nested content', async () => {
      const feed = await AtomFeed.parse(APPS_FEED);
      expect(feed.entries).toHaveLength(1);

      const entry = feed.entries[0];
      expect(entry?.title).toBe('search');
      expect(entry?.author).toBe('system');
      expect(entry?.links.get('alternate')).toBe('/servicesNS/nobody/system/apps/local/search');
      expect(entry?.published).toBe(MIN_TIMESTAMP);
      expect(toPlainValue(entry?.content ?? null)).toEqual({
        CheckForUpdates: '1',
        Disabled: '0',
        Eai: {
          Acl: {
            App: 'system',
            Owner: 'nobody',
            Perms: { Read: ['*'], Write: ['admin', 'power'] },
          },
        },
        Label: 'Search & Reporting',
        Version: '6.0.3',
        Visible: '1',
      });
    });

    it('should leave messages unset when the feed has no message block', async () => {
      const feed = await AtomFeed.parse(`<feed xmlns:s="http://dev.splunk.com/ns/rest">
        <entry>
          <title>main</title>
          <content type="text/xml"><s:dict><s:key name="disabled">0</s:key></s:dict></content>
        </entry>
      </feed>`);

      expect(feed.entries).toHaveLength(1);
      expect(feed.messages).toBeUndefined();
      expect(toPlainValue(feed.entries[0]?.content ?? null)).toEqual({ Disabled: '0' });
    });

    it('should read server messages', async () => {
      const feed = await AtomFeed.parse(`<feed>
        <s:messages>
          <s:msg type="WARN">Index is near its size limit</s:msg>
          <s:msg type="INFO">Restart pending</s:msg>
        </s:messages>
      </feed>`);

      expect(feed.messages).toEqual([
        { type: MessageType.Warning, text: 'Index is near its size limit' },
        { type: MessageType.Information, text: 'Restart pending' },
      ]);
    });

    it('should default pagination fields the feed omits', async () => {
      const feed = await AtomFeed.parse('<feed><opensearch:totalResults>42</opensearch:totalResults></feed>');

      expect(feed.pagination.itemsPerPage).toBe(0);
      expect(feed.pagination.startIndex).toBe(0);
      expect(feed.pagination.totalResults).toBe(42);
      expect(feed.updated).toBe(MIN_TIMESTAMP);
      expect(feed.links.size).toBe(0);
    });

    it('should reject unknown elements', async () => {
      await expect(AtomFeed.parse('<feed><bogus/></feed>')).rejects.toThrow('Unexpected start tag <bogus> in <feed>');
    });

    it('should reject an empty document', async () => {
      await expect(AtomFeed.parse('')).rejects.toThrow('Expected a <feed> document, but the response is empty');
    });

    it('should reject unknown message types', async () => {
      await expect(AtomFeed.parse('<feed><s:messages><s:msg type="LOUD">x</s:msg></s:messages></feed>')).rejects.toThrow(
        "MessageType.type: 'LOUD' is not a recognized value"
      );
    });

    it('should reject an end tag without a start tag', async () => {
      await expect(AtomFeed.parse('<feed><title>x</title></bogus></feed>')).rejects.toThrow(
        'Malformed XML document: unexpected end tag'
      );
    });

    it('should reject crossed end tags', async () => {
      await expect(AtomFeed.parse('<feed><title>x</feed></title>')).rejects.toThrow(FormatError);
    });

    it('should reject non-numeric pagination', async () => {
      await expect(
        AtomFeed.parse('<feed><opensearch:startIndex>first</opensearch:startIndex></feed>')
      ).rejects.toThrow(FormatError);
    });
  });
});

describe('AtomEntry', () => {
  it('should keep the last link of a relation', async () => {
    const entry = await AtomEntry.parse(`<entry>
      <link href="/a" rel="edit"/>
      <link href="/b" rel="edit"/>
    </entry>`);

    expect(entry.links.get('edit')).toBe('/b');
    expect(entry.content).toBeNull();
    expect(entry.updated).toBe(MIN_TIMESTAMP);
  });

  it('should require link attributes', async () => {
    await expect(AtomEntry.parse('<entry><link href="/a"/></entry>')).rejects.toThrow(
      "Missing required attribute 'rel' on <link>"
    );
  });

  it('should read published timestamps', async () => {
    const entry = await AtomEntry.parse('<entry><published>2014-03-18T14:42:58Z</published></entry>');
    expect(entry.published.toISOString()).toBe('2014-03-18T14:42:58.000Z');
  });

  it('should read scalar and empty content', async () => {
    const text = await AtomEntry.parse('<entry><content type="text">plain words</content></entry>');
    expect(toPlainValue(text.content)).toBe('plain words');

    const empty = await AtomEntry.parse('<entry><content type="text/xml"/></entry>');
    expect(empty.content).toBeNull();
  });

  it('should read empty keys as null', async () => {
    const entry = await AtomEntry.parse(
      entryWithContent('<s:dict><s:key name="description"/><s:key name="search"></s:key><s:key name="tags"><s:list/></s:key></s:dict>')
    );

    expect(toPlainValue(entry.content)).toEqual({ Description: null, Search: null, Tags: [] });
  });

  it('should rewrite top-level flags that share a prefix with settings', async () => {
    const entry = await AtomEntry.parse(
      entryWithContent(`<s:dict>
        <s:key name="action.email">1</s:key>
        <s:key name="action.email.to">ops@example.com</s:key>
        <s:key name="alert_type">number of events</s:key>
      </s:dict>`)
    );

    expect(getScalar(entry.content, 'Action', 'Email', 'IsEnabled')).toBe('1');
    expect(getScalar(entry.content, 'Action', 'Email', 'To')).toBe('ops@example.com');
    expect(getScalar(entry.content, 'Alert', 'Type')).toBe('number of events');
  });

  it('should not rewrite keys of nested dictionaries', async () => {
    const entry = await AtomEntry.parse(
      entryWithContent(`<s:dict>
        <s:key name="eai:attributes">
          <s:dict><s:key name="alert_type">always</s:key></s:dict>
        </s:key>
      </s:dict>`)
    );

    expect(getScalar(entry.content, 'Eai', 'Attributes', 'AlertType')).toBe('always');
  });

  it('should report a collision when no rewrite separates a flag from its settings', async () => {
    const content = entryWithContent(`<s:dict>
      <s:key name="action.email">1</s:key>
      <s:key name="action.email.to">ops@example.com</s:key>
    </s:dict>`);

    await expect(AtomEntry.parse(content, { keyRewrites: new Map() })).rejects.toThrow(
      "Content key 'Email' collides with an existing value"
    );
  });

  it('should apply custom rewrites', async () => {
    const entry = await AtomEntry.parse(entryWithContent('<s:dict><s:key name="color">red</s:key></s:dict>'), {
      keyRewrites: new Map([['color', 'display.color']]),
    });

    expect(toPlainValue(entry.content)).toEqual({ Display: { Color: 'red' } });
  });

  it('should reject an end tag for an element that is not open', async () => {
    await expect(AtomEntry.parse('<entry><title>x</id></entry>')).rejects.toThrow(FormatError);
  });

  it('should reject an end tag that skips an open element', async () => {
    await expect(AtomEntry.parse('<entry><title>x</entry>')).rejects.toThrow(
      'Malformed XML document: mismatched end tag, <title> is still open'
    );
  });

  it('should reject other children of content', async () => {
    await expect(AtomEntry.parse('<entry><content><s:table/></content></entry>')).rejects.toThrow(
      'Unexpected start tag <s:table> in <content>'
    );
  });
});
