export type Member = {
  memberId: string;
  name: string;
  email: string;
  borrowedIsbns: string[];
};

export type MemberInput = {
  memberId: string;
  name: string;
  email: string;
};

export type MemberUpdate = {
  name?: string;
  email?: string;
};
