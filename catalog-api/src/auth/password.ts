import { hashPassword, verifyPassword } from 'better-auth/crypto'

/** Salted scrypt hash in better-auth's `salt:key` hex format. */
export async function hashSecret(secret: string): Promise<string> {
  return hashPassword(secret)
}

export async function verifySecret(secret: string, storedHash: string): Promise<boolean> {
  try {
    return await verifyPassword({ hash: storedHash, password: secret })
  } catch {
    // better-auth throws on a hash that is not `salt:key`
    return false
  }
}

let dummyHash: Promise<string> | null = null

/**
 * Spends the same work as a real verification, for logins naming an unknown
 * user.
 */
export async function burnVerification(secret: string): Promise<void> {
  dummyHash ??= hashSecret('not-a-real-password')
  await verifySecret(secret, await dummyHash)
}
