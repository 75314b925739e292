import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DirectoryService } from '../directory.service';
import { MetricsService } from '../../metrics/metrics.service';
import { METRIC_PATHS } from '../../metrics/metrics.constants';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('DirectoryService', () => {
  let service: DirectoryService;
  let metricsService: MetricsService;
  let restoreLogger: () => void;

  beforeEach(async () => {
    restoreLogger = silenceNestLogger();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DirectoryService,
        MetricsService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) => (key === 'mailrelay.directory.domains' ? ['earth.test', 'Saturn.Test'] : undefined)),
          },
        },
      ],
    }).compile();

    service = module.get<DirectoryService>(DirectoryService);
    metricsService = module.get<MetricsService>(MetricsService);
  });

  afterEach(() => {
    restoreLogger();
  });

  describe('register', () => {
    it('should register an address in an authorized domain', () => {
      const result = service.register('alice@earth.test', 'http://mail-earth:3000');

      expect(result).toEqual({ accepted: true, reason: 'Mailbox registered successfully' });
      expect(service.lookup('alice@earth.test')).toEqual({ found: true, location: 'http://mail-earth:3000' });
      expect(metricsService.get(METRIC_PATHS.DIRECTORY_REGISTRATIONS_TOTAL)).toBe(1);
    });

    it('should overwrite the location on re-registration', () => {
      service.register('alice@earth.test', 'http://old:3000');
      service.register('alice@earth.test', 'http://new:3000');

      expect(service.lookup('alice@earth.test')).toEqual({ found: true, location: 'http://new:3000' });
      expect(service.getEntryCount()).toBe(1);
    });

    it('should reject an address in a domain it does not manage', () => {
      const result = service.register('carol@mars.test', 'http://mail-mars:3000');

      expect(result).toEqual({
        accepted: false,
        reason: "Domain 'mars.test' is not managed by this Nameserver.",
      });
      expect(service.lookup('carol@mars.test')).toEqual({ found: false, location: '' });
      expect(metricsService.get(METRIC_PATHS.DIRECTORY_REGISTRATIONS_REJECTED)).toBe(1);
      expect(metricsService.get(METRIC_PATHS.DIRECTORY_REGISTRATIONS_TOTAL)).toBe(0);
    });

    it('should leave an existing mapping untouched when a registration is rejected', () => {
      service.register('alice@earth.test', 'http://mail-earth:3000');
      service.register('alice@mars.test', 'http://mail-mars:3000');

      expect(service.lookup('alice@earth.test').location).toBe('http://mail-earth:3000');
      expect(service.getEntryCount()).toBe(1);
    });

    it('should match authorized domains exactly', () => {
      expect(service.register('bob@Saturn.Test', 'http://mail-saturn:3000').accepted).toBe(true);
      expect(service.register('alice@EARTH.test', 'http://mail-earth:3000')).toEqual({
        accepted: false,
        reason: "Domain 'EARTH.test' is not managed by this Nameserver.",
      });
      expect(service.getEntryCount()).toBe(1);
    });

    it('should reject empty arguments', () => {
      expect(() => service.register('', 'http://mail-earth:3000')).toThrow(
        new BadRequestException('email address and mailbox address cannot be empty'),
      );
      expect(() => service.register('alice@earth.test', '')).toThrow(BadRequestException);
    });

    it('should reject malformed addresses', () => {
      expect(() => service.register('alice.earth.test', 'http://mail-earth:3000')).toThrow(
        'invalid email address format: alice.earth.test',
      );
      expect(() => service.register('a@b@earth.test', 'http://mail-earth:3000')).toThrow(
        'invalid email address format: a@b@earth.test',
      );
    });
  });

  describe('lookup', () => {
    it('should report unknown addresses as not found', () => {
      expect(service.lookup('nobody@earth.test')).toEqual({ found: false, location: '' });
      expect(metricsService.get(METRIC_PATHS.DIRECTORY_LOOKUPS_TOTAL)).toBe(1);
      expect(metricsService.get(METRIC_PATHS.DIRECTORY_LOOKUPS_NOT_FOUND)).toBe(1);
    });

    it('should compare addresses exactly', () => {
      service.register('alice@earth.test', 'http://mail-earth:3000');
      expect(service.lookup('Alice@earth.test').found).toBe(false);
    });

    it('should not create entries', () => {
      service.lookup('nobody@earth.test');
      expect(service.getEntryCount()).toBe(0);
    });

    it('should reject an empty address', () => {
      expect(() => service.lookup('')).toThrow(new BadRequestException('email address cannot be empty'));
    });
  });

  describe('domains', () => {
    it('should expose the authorized domains as configured', () => {
      expect(service.getAuthorizedDomains()).toEqual(['earth.test', 'Saturn.Test']);
      expect(service.isAuthoritativeFor('earth.test')).toBe(true);
      expect(service.isAuthoritativeFor('EARTH.TEST')).toBe(false);
      expect(service.isAuthoritativeFor('mars.test')).toBe(false);
    });
  });
});
