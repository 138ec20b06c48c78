import { Body, Controller, HttpCode, Post, UseGuards } from '@nestjs/common';
import { LoginSchema } from '@rfq-intake/validation';

import { parseBody } from '../common/parse-body';
import { RfqSession } from '../sessions/session.store';
import { AuthService } from './auth.service';
import { CurrentSession } from './current-session.decorator';
import { JwtAuthGuard } from './jwt-auth.guard';

@Controller('auth')
export class AuthController {
  constructor(private readonly auth: AuthService) {}

  @Post('login')
  @HttpCode(200)
  login(@Body() body: unknown) {
    const { username, password } = parseBody(LoginSchema, body);
    return this.auth.login(username, password);
  }

  @Post('logout')
  @HttpCode(204)
  @UseGuards(JwtAuthGuard)
  logout(@CurrentSession() session: RfqSession): void {
    this.auth.logout(session.id);
  }
}
