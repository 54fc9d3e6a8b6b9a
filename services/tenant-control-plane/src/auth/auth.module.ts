import { Module } from '@nestjs/common';
import { CredentialResolverFactory } from './credential-resolver.factory';

@Module({
  providers: [CredentialResolverFactory],
  exports: [CredentialResolverFactory],
})
export class AuthModule {}
