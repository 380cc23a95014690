import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { AccountsService } from './accounts.service';

@Controller()
@ApiTags('Accounts')
export class AccountsController {
  constructor(private readonly accountsService: AccountsService) {}

  @Get('status')
  @ApiOperation({
    summary: 'Get pool status',
    description:
      'Returns health, lease and token state of every pooled account. Not behind the API key.',
  })
  @ApiResponse({ status: 200, description: 'Pool status' })
  getStatus() {
    return this.accountsService.getStatus();
  }
}
