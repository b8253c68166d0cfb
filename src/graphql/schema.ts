export const schema = `
  """A registered author."""
  type User {
    """Stable identifier."""
    id: ID!
    """Role name; admins may read post contents."""
    role: String
  }

  """A blog post owned by a user."""
  type Post {
    """Stable identifier."""
    id: ID!
    """Post headline."""
    title: String!
    """Owning user identifier."""
    userId: ID!
  }

  input CreatePostInput {
    """Author of the new post."""
    userId: ID!
    """Optional headline; a default is used when omitted."""
    title: String
  }

  type CreatePostPayload {
    post: Post
  }

  type Query {
    """Posts of one user. Only that user may list them."""
    posts(userId: ID!): [Post!]!
    """Same listing, visible to admins only."""
    postsWithMask(userId: ID!): [Post!]!
    """All users, or one user when the admin-only userId filter is given."""
    usersWithArgumentMask(userId: ID): [User!]!
  }

  type Mutation {
    """Creates a post on behalf of the given user."""
    createPost(input: CreatePostInput!): CreatePostPayload
  }
`;
