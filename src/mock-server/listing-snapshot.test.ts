import { describe, it, expect } from '@jest/globals';
import {
  createListingSnapshot,
  toListModulesResponse,
  toListServicesResponse,
} from './listing-snapshot';

const AS_OF = new Date(1_700_000_000_123);

describe('listing snapshot', () => {
  const snapshot = createListingSnapshot(AS_OF);

  it('should list the two known services', () => {
    const response = toListServicesResponse(snapshot);

    expect(response.totalCount).toBe(2);
    expect(response.services).toEqual([
      {
        serviceName: 'repository-service',
        serviceId: 'repo-1',
        host: 'localhost',
        port: 8080,
        version: '1.0.0',
        isHealthy: true,
      },
      {
        serviceName: 'account-manager',
        serviceId: 'account-1',
        host: 'localhost',
        port: 38105,
        version: '1.0.0',
        isHealthy: true,
      },
    ]);
  });

  it('should list the two known modules', () => {
    const response = toListModulesResponse(snapshot);

    expect(response.totalCount).toBe(2);
    expect(response.modules.map(m => m.moduleName)).toEqual(['parser', 'chunker']);
    expect(response.modules[0]).toMatchObject({
      serviceId: 'parser-1',
      port: 8081,
      inputFormat: 'text/plain',
      outputFormat: 'application/json',
      documentTypes: ['text'],
    });
    expect(response.modules[1]).toMatchObject({
      serviceId: 'chunker-1',
      port: 8082,
      inputFormat: 'application/json',
      outputFormat: 'application/json',
    });
  });

  it('should stamp responses with the snapshot time', () => {
    expect(toListServicesResponse(snapshot).asOf).toEqual({ seconds: 1_700_000_000, nanos: 123_000_000 });
    expect(toListModulesResponse(snapshot).asOf).toEqual({ seconds: 1_700_000_000, nanos: 123_000_000 });
  });

  it('should hand out copies that leave the snapshot untouched', () => {
    const first = toListModulesResponse(snapshot);
    first.modules[0].documentTypes.push('pdf');
    first.modules.pop();

    const second = toListModulesResponse(snapshot);
    expect(second.modules).toHaveLength(2);
    expect(second.modules[0].documentTypes).toEqual(['text']);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.services)).toBe(true);
    expect(Object.isFrozen(snapshot.modules[0])).toBe(true);
  });

  it('should not follow later changes to the source date', () => {
    const source = new Date(1_000);
    const copy = createListingSnapshot(source);
    source.setTime(2_000);

    expect(copy.asOf.getTime()).toBe(1_000);
  });
});
