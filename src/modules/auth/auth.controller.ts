import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { parseRequest } from '../../common/validation/parse-request';
import { toAuthResponseDto } from '../users/user.dto';
import { loginSchema, registerSchema } from './auth.schemas';
import { AuthService } from './auth.service';

@Controller('auth')
export class AuthController {
  constructor(private readonly auth: AuthService) {}

  @Post('register')
  async register(@Body() body: unknown) {
    const input = parseRequest(registerSchema, body);
    const res = await this.auth.register(input);
    return { data: toAuthResponseDto(res) };
  }

  @Post('login')
  @HttpCode(200)
  async login(@Body() body: unknown) {
    const input = parseRequest(loginSchema, body);
    const res = await this.auth.login(input);
    return { data: toAuthResponseDto(res) };
  }
}
