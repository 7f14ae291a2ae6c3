import { FactoryProvider, Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AttachmentsModule } from './attachments.module';
import { ATTACHMENT_OPTIONS } from './constants/attachment.constants';
import { AttachmentsService } from './services/attachments.service';

function isOptionsProvider(provider: Provider): provider is FactoryProvider {
  return typeof provider === 'object' && 'useFactory' in provider && provider.provide === ATTACHMENT_OPTIONS;
}

describe('AttachmentsModule', () => {
  const optionsProvider = (module: ReturnType<typeof AttachmentsModule.register>): FactoryProvider => {
    const provider = (module.providers ?? []).find(isOptionsProvider);
    if (!provider) {
      throw new Error('ATTACHMENT_OPTIONS provider missing');
    }
    return provider;
  };

  it('should export the service and the resolved options', () => {
    const module = AttachmentsModule.register();

    expect(module.module).toBe(AttachmentsModule);
    expect(module.exports).toEqual(expect.arrayContaining([ATTACHMENT_OPTIONS, AttachmentsService]));
  });

  it('should resolve options against the configured defaults', () => {
    const provider = optionsProvider(AttachmentsModule.register({ contentType: 'text/plain', maxSize: 10 }));
    const configService = new ConfigService({ attachments: { pathPrefix: '/uploads', storage: 's3' } });

    expect(provider.useFactory(configService)).toEqual({
      contentTypes: ['text/plain'],
      size: { min: 1, max: 10 },
      pathPrefix: 'uploads',
      storage: 's3',
    });
  });

  it('should prefer per-model options over configuration', () => {
    const provider = optionsProvider(AttachmentsModule.register({ pathPrefix: 'avatars', storage: 'file_system' }));
    const configService = new ConfigService({ attachments: { pathPrefix: 'uploads', storage: 's3' } });

    expect(provider.useFactory(configService)).toMatchObject({ pathPrefix: 'avatars', storage: 'file_system' });
  });

  it('should reject an unknown configured storage', () => {
    const provider = optionsProvider(AttachmentsModule.register());
    const configService = new ConfigService({ attachments: { storage: 'ftp' } });

    expect(() => provider.useFactory(configService)).toThrow('Unknown attachment storage: ftp');
  });
});
