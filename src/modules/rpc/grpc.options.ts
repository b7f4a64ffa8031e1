import type { GrpcOptions } from '@nestjs/microservices';
import { Transport } from '@nestjs/microservices';
import type { GrpcListenerConfig } from '../app/app-config.service';
import { BLOG_PROTO_LOADER_OPTIONS, BLOG_PROTO_PACKAGE, BLOG_PROTO_PATH } from '../../common/grpc/blog-proto';

export function grpcOptions(config: GrpcListenerConfig): GrpcOptions {
  return {
    transport: Transport.GRPC,
    options: {
      url: config.url,
      package: BLOG_PROTO_PACKAGE,
      protoPath: BLOG_PROTO_PATH,
      loader: BLOG_PROTO_LOADER_OPTIONS,
      maxReceiveMessageLength: config.maxReceiveMessageLength,
      maxSendMessageLength: config.maxSendMessageLength,
    },
  };
}
