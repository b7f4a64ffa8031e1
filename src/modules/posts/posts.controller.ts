import { Body, Controller, Delete, Get, HttpCode, Param, Post, Put, Query, UseGuards } from '@nestjs/common';
import { resolveLimit, resolveOffset } from '../../common/pagination/pagination';
import { parseRequest } from '../../common/validation/parse-request';
import { AuthGuard } from '../auth/auth.guard';
import { CurrentUserId } from '../users/users.decorator';
import { toListPostsDto, toPostDto } from './post.dto';
import { listPostsQuerySchema, postIdParamSchema, postInputSchema } from './posts.schemas';
import { PostsService } from './posts.service';

@Controller('posts')
export class PostsController {
  constructor(private readonly posts: PostsService) {}

  @Get()
  async list(@Query() query: unknown) {
    const parsed = parseRequest(listPostsQuerySchema, query);
    const limit = resolveLimit(parsed.limit);
    const offset = resolveOffset(parsed.offset);
    const page = await this.posts.list({ limit, offset });
    return { data: toListPostsDto(page) };
  }

  @Get(':id')
  async get(@Param('id') id: string) {
    const post = await this.posts.get(parseRequest(postIdParamSchema, id, 'id'));
    return { data: toPostDto(post) };
  }

  @UseGuards(AuthGuard)
  @Post()
  async create(@CurrentUserId() userId: number, @Body() body: unknown) {
    const input = parseRequest(postInputSchema, body);
    const post = await this.posts.create(userId, input);
    return { data: toPostDto(post) };
  }

  @UseGuards(AuthGuard)
  @Put(':id')
  async update(@CurrentUserId() userId: number, @Param('id') id: string, @Body() body: unknown) {
    const postId = parseRequest(postIdParamSchema, id, 'id');
    const input = parseRequest(postInputSchema, body);
    const post = await this.posts.update(userId, postId, input);
    return { data: toPostDto(post) };
  }

  @UseGuards(AuthGuard)
  @Delete(':id')
  @HttpCode(204)
  async remove(@CurrentUserId() userId: number, @Param('id') id: string) {
    await this.posts.delete(userId, parseRequest(postIdParamSchema, id, 'id'));
  }
}
