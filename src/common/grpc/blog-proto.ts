import { join } from 'path';

export const BLOG_PROTO_PACKAGE = 'quill.v1';
export const BLOG_SERVICE_NAME = 'BlogService';

// proto/ sits at the repository root, beside src/ and dist/.
export const BLOG_PROTO_PATH = join(__dirname, '..', '..', '..', 'proto', 'blog.proto');

/** Shared by the server listener and the client so both see the same message shapes. */
export const BLOG_PROTO_LOADER_OPTIONS = {
  keepCase: false,
  longs: Number,
  enums: String,
  defaults: true,
  oneofs: true,
};
