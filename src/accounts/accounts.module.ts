import { Module, Global } from '@nestjs/common';
import { AccountsService } from './accounts.service';
import { AccountsController } from './accounts.controller';
import { CredentialStoreService } from './credential-store.service';
import { TokenService } from './token.service';

@Global()
@Module({
  controllers: [AccountsController],
  providers: [AccountsService, CredentialStoreService, TokenService],
  exports: [AccountsService, TokenService],
})
export class AccountsModule {}
