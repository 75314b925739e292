import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { DirectoryClientModule } from '../directory-client.module';
import { DIRECTORY_CLIENT, type DirectoryClient } from '../directory-client.interface';
import { HttpDirectoryClient } from '../http-directory.client';
import { InProcessDirectoryClient } from '../in-process-directory.client';
import { silenceNestLogger } from '../../../../test/helpers/silence-logger';

function configWith(directory: { domains: string[]; url?: string; lookupTimeout: number }) {
  return ConfigModule.forRoot({
    isGlobal: true,
    ignoreEnvFile: true,
    load: [() => ({ mailrelay: { directory } })],
  });
}

describe('DirectoryClientModule', () => {
  let restoreLogger: () => void;

  beforeEach(() => {
    restoreLogger = silenceNestLogger();
  });

  afterEach(() => {
    restoreLogger();
  });

  it('should call the hosted directory in process', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        configWith({ domains: ['earth.test'], lookupTimeout: 500 }),
        DirectoryClientModule.forRoot({ hostsDirectory: true }),
      ],
    }).compile();

    const client = moduleRef.get<DirectoryClient>(DIRECTORY_CLIENT);
    expect(client).toBeInstanceOf(InProcessDirectoryClient);

    await expect(client.register('alice@earth.test', 'http://mail-earth:3000')).resolves.toEqual({
      accepted: true,
      reason: 'Mailbox registered successfully',
    });
    await expect(client.lookup('alice@earth.test')).resolves.toEqual({
      found: true,
      location: 'http://mail-earth:3000',
    });
  });

  it('should use the remote directory when a URL is configured', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        configWith({ domains: [], url: 'http://directory:3000', lookupTimeout: 500 }),
        DirectoryClientModule.forRoot({ hostsDirectory: false }),
      ],
    }).compile();

    expect(moduleRef.get<DirectoryClient>(DIRECTORY_CLIENT)).toBeInstanceOf(HttpDirectoryClient);
  });

  it('should refuse to start without any directory', async () => {
    await expect(
      Test.createTestingModule({
        imports: [
          configWith({ domains: [], lookupTimeout: 500 }),
          DirectoryClientModule.forRoot({ hostsDirectory: false }),
        ],
      }).compile(),
    ).rejects.toThrow('No directory available: set MAILRELAY_DIRECTORY_URL or host the directory role');
  });
});
