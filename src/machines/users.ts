export const USERS = ["alice", "bob", "charlie"] as const;
export type User = (typeof USERS)[number];

export const U64_MAX = 2n ** 64n - 1n;
