import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { PostsModule } from '../posts/posts.module';
import { RpcController } from './rpc.controller';

@Module({
  imports: [AuthModule, PostsModule],
  controllers: [RpcController],
})
export class RpcModule {}
