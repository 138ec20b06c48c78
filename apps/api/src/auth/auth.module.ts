import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';

import { APP_CONFIG, AppConfig } from '../config/app-config';
import { WizardModule } from '../wizard/wizard.module';
import { AuthController } from './auth.controller';
import { AuthService, TOKEN_TTL_SECONDS } from './auth.service';
import { CredentialStore } from './credential-store';
import { JwtStrategy } from './jwt.strategy';

@Module({
  imports: [
    PassportModule.register({ defaultStrategy: 'jwt' }),
    JwtModule.registerAsync({
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => ({
        secret: config.auth.jwtSecret,
        signOptions: {
          issuer: config.auth.jwtIssuer,
          audience: config.auth.jwtAudience,
          algorithm: 'HS256',
          expiresIn: TOKEN_TTL_SECONDS,
        },
      }),
    }),
    WizardModule,
  ],
  controllers: [AuthController],
  providers: [CredentialStore, AuthService, JwtStrategy],
  exports: [PassportModule],
})
export class AuthModule {}
