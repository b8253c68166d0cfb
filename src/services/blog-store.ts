export type User = {
    id: string;
    role: string | null;
};

export type Post = {
    id: string;
    title: string;
    userId: string;
};

export type CreatePostInput = {
    userId: string;
    title?: string | null;
};

const DEFAULT_POST_TITLE = 'Post Title';

export class BlogStore {
    private readonly users: User[];
    private readonly posts: Post[];

    constructor(seed: { users: User[]; posts: Post[] }) {
        this.users = seed.users.map((user) => ({ ...user }));
        this.posts = seed.posts.map((post) => ({ ...post }));
    }

    listUsers(): User[] {
        return [...this.users];
    }

    findUser(id: string): User | undefined {
        return this.users.find((user) => user.id === id);
    }

    listPostsByUser(userId: string): Post[] {
        return this.posts.filter((post) => post.userId === userId);
    }

    createPost(input: CreatePostInput): Post {
        const post: Post = {
            id: String(this.posts.length + 1),
            title: input.title ?? DEFAULT_POST_TITLE,
            userId: input.userId
        };

        this.posts.push(post);
        return post;
    }
}

export function createBlogStore(): BlogStore {
    return new BlogStore({
        users: [
            { id: '1', role: 'admin' },
            { id: '2', role: 'not_admin' }
        ],
        posts: [
            { id: '1', title: DEFAULT_POST_TITLE, userId: '1' }
        ]
    });
}
