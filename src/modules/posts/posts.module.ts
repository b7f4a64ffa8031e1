import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { PostsController } from './posts.controller';
import { POSTS_REPOSITORY } from './posts.repository';
import { PostsDrizzleRepository } from './posts-drizzle.repository';
import { PostsService } from './posts.service';

@Module({
  imports: [AuthModule],
  controllers: [PostsController],
  providers: [PostsService, { provide: POSTS_REPOSITORY, useClass: PostsDrizzleRepository }],
  exports: [PostsService],
})
export class PostsModule {}
