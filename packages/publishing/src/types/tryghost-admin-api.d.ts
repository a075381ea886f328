declare module "@tryghost/admin-api" {
  interface GhostAdminAPIOptions {
    url: string;
    key: string;
    version: string;
  }

  interface PostData {
    title: string;
    html?: string;
    slug?: string;
    custom_excerpt?: string;
    status?: "draft" | "published" | "scheduled";
    published_at?: string;
    tags?: Array<{ name: string }>;
  }

  interface Post {
    id: string;
    url: string;
    title: string;
    slug: string;
    status: string;
    published_at: string | null;
  }

  interface PostsAPI {
    add(data: PostData, options?: { source?: string }): Promise<Post>;
  }

  class GhostAdminAPI {
    constructor(options: GhostAdminAPIOptions);
    posts: PostsAPI;
  }

  export = GhostAdminAPI;
}
