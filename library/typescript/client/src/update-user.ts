import type { UpdateUserPayload, User } from '@supakit/auth';

/**
 * ユーザー情報の更新内容を組み立てる。send() で PUT /user を送る。
 */
export class UpdateUserBuilder {
  private readonly payload: UpdateUserPayload = {};

  constructor(private readonly sendFn: (payload: UpdateUserPayload) => Promise<User>) {}

  email(email: string): this {
    this.payload.email = email;
    return this;
  }

  password(password: string): this {
    this.payload.password = password;
    return this;
  }

  data(data: Record<string, unknown>): this {
    this.payload.data = data;
    return this;
  }

  async send(): Promise<User> {
    return this.sendFn({ ...this.payload });
  }
}
