/**
 * Tests for namespaces and resource paths
 */

import { ConfigError } from '../../errors/index.js';
import { Namespace, ResourceName, WILDCARD } from '../index.js';

describe('Namespace', () => {
  it('should map the default namespace to /services/', () => {
    expect(Namespace.default.toPath()).toBe('/services/');
    expect(Namespace.default.isDefault).toBe(true);
  });

  it('should fill missing parts with the wildcard', () => {
    expect(new Namespace('admin').toPath()).toBe('/servicesNS/admin/-/');
    expect(new Namespace(undefined, 'search').toPath()).toBe('/servicesNS/-/search/');
    expect(Namespace.all.toPath()).toBe(`/servicesNS/${WILDCARD}/${WILDCARD}/`);
    expect(Namespace.all.isWildcard).toBe(true);
  });

  it('should encode owner and app', () => {
    expect(new Namespace('jane doe', 'my/app').toPath()).toBe('/servicesNS/jane%20doe/my%2Fapp/');
  });

  it('should compare by owner and app', () => {
    expect(new Namespace('admin', 'search').equals(new Namespace('admin', 'search'))).toBe(true);
    expect(new Namespace('admin').equals(Namespace.default)).toBe(false);
  });

  it('should reject empty parts', () => {
    expect(() => new Namespace('')).toThrow(ConfigError);
    expect(() => new Namespace('admin', ' ')).toThrow('Invalid configuration: namespace.app: must not be empty');
  });
});

describe('ResourceName', () => {
  it('should encode each segment', () => {
    const name = ResourceName.savedSearches.child('Errors in the last hour', 'dispatch');

    expect(name.toPath()).toBe('saved/searches/Errors%20in%20the%20last%20hour/dispatch');
    expect(name.toString()).toBe('saved/searches/Errors in the last hour/dispatch');
    expect(name.title).toBe('dispatch');
  });

  it('should reject empty segments', () => {
    expect(() => new ResourceName()).toThrow(ConfigError);
    expect(() => ResourceName.dataIndexes.child('')).toThrow(ConfigError);
  });
});
