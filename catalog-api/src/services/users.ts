import { burnVerification, hashSecret, verifySecret } from '../auth/password'
import type { TokenService } from '../auth/tokens'
import type { CredentialStore } from '../db/store'
import { fail, ok, type Result } from '../errors'
import { log } from '../logger'
import type { Genre, User } from '../types'

export interface Registration {
  username: string
  email: string
  password: string
  genre: Genre
}

export interface AccessToken {
  access_token: string
  token_type: 'bearer'
}

export interface UsersService {
  register(input: Registration): Promise<Result<User>>
  login(username: string, password: string): Promise<Result<AccessToken>>
}

const BAD_LOGIN = 'Incorrect username or password'

export function createUsersService(deps: { users: CredentialStore; tokens: TokenService }): UsersService {
  const { users, tokens } = deps

  return {
    async register({ username, email, password, genre }) {
      const passwordHash = await hashSecret(password)
      const created = await users.createUser({ username, email, passwordHash, genre, role: 'user' })
      if (created.success) {
        log('user.registered', { user_id: created.data.id })
      }
      return created
    },

    async login(username, password) {
      const user = await users.findByUsername(username)
      if (!user) {
        await burnVerification(password)
        return fail('InvalidCredentials', BAD_LOGIN)
      }
      if (!(await verifySecret(password, user.password_hash))) {
        log('user.login_failed', { user_id: user.id })
        return fail('InvalidCredentials', BAD_LOGIN)
      }
      const token = await tokens.issue(user.id, user.username)
      return ok({ access_token: token, token_type: 'bearer' })
    },
  }
}
