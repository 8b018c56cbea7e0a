import { maskSecret, maskSecretsInMessage } from '../../src/domain/errors';

describe('maskSecret', () => {
  it('masks all but last 4 characters for long secrets', () => {
    const secret = 'test-secret-value';
    expect(maskSecret(secret)).toBe('*'.repeat(secret.length - 4) + 'alue');
  });

  it('fully masks secrets shorter than 8 characters', () => {
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('1234567')).toBe('****');
  });

  it('preserves last 4 characters for 8-character secrets', () => {
    expect(maskSecret('12345678')).toBe('****5678');
  });

  it('handles empty string', () => {
    expect(maskSecret('')).toBe('****');
  });
});

describe('maskSecretsInMessage', () => {
  it('masks every occurrence of a secret', () => {
    expect(maskSecretsInMessage('password test-password rejected, retried test-password', ['test-password'])).toBe(
      'password *********word rejected, retried *********word',
    );
  });

  it('masks several secrets', () => {
    expect(maskSecretsInMessage('a=secret-one b=secret-two', ['secret-one', 'secret-two'])).toBe(
      'a=******-one b=******-two',
    );
  });

  it('ignores empty secrets', () => {
    expect(maskSecretsInMessage('nothing here', ['', 'absent'])).toBe('nothing here');
  });

  it('treats secrets as literal text', () => {
    expect(maskSecretsInMessage('token a.b*c+d$ used', ['a.b*c+d$'])).toBe('token ****c+d$ used');
  });
});
