import jwt from 'jsonwebtoken';
import { createAuthMiddlewares, verifyAccessToken } from '../../src/middlewares/authMiddlewares.js';
import { AppError } from '../../src/utils/AppError.js';
import { ADMIN, STUDENT, mockNext, mockRequest, mockResponse } from '../support/testHelpers.js';

const SECRET = 'test-secret';
const sign = (payload: object, secret = SECRET, options: jwt.SignOptions = {}) => jwt.sign(payload, secret, options);

describe('auth middlewares', () => {
  const { protect, optionalAuth, restrictTo } = createAuthMiddlewares(SECRET);

  describe('verifyAccessToken', () => {
    it('should map the token subject to the user id', () => {
      const token = sign({ sub: STUDENT.id, role: 'student' });
      expect(verifyAccessToken(token, SECRET)).toEqual(STUDENT);
    });

    it('should reject unknown roles', () => {
      const token = sign({ sub: STUDENT.id, role: 'teacher' });
      expect(() => verifyAccessToken(token, SECRET)).toThrow('Invalid token payload');
    });

    it('should reject tokens signed with another secret', () => {
      const token = sign({ sub: STUDENT.id, role: 'student' }, 'other-secret');
      expect(() => verifyAccessToken(token, SECRET)).toThrow(jwt.JsonWebTokenError);
    });
  });

  describe('protect', () => {
    it('should attach the user from a bearer token', () => {
      const req = mockRequest({ headers: { authorization: `Bearer ${sign({ sub: ADMIN.id, role: 'admin' })}` } });
      const next = mockNext();

      protect(req, mockResponse().asResponse, next);

      expect(req.user).toEqual(ADMIN);
      expect(next).toHaveBeenCalledWith();
    });

    it('should read the token from the jwt cookie', () => {
      const req = mockRequest({ cookies: { jwt: sign({ sub: STUDENT.id, role: 'student' }) } });
      const next = mockNext();

      protect(req, mockResponse().asResponse, next);

      expect(req.user).toEqual(STUDENT);
    });

    it('should reject requests without a token', () => {
      const next = mockNext();

      protect(mockRequest(), mockResponse().asResponse, next);

      const [err] = next.mock.calls[0] ?? [];
      expect(err).toBeInstanceOf(AppError);
      expect(err).toMatchObject({ statusCode: 401 });
    });

    it('should forward expired tokens to the error handler', () => {
      const token = sign({ sub: STUDENT.id, role: 'student', exp: Math.floor(Date.now() / 1000) - 60 });
      const next = mockNext();

      protect(mockRequest({ headers: { authorization: `Bearer ${token}` } }), mockResponse().asResponse, next);

      expect(next.mock.calls[0]?.[0]).toBeInstanceOf(jwt.TokenExpiredError);
    });
  });

  describe('optionalAuth', () => {
    it('should continue anonymously when the token is invalid', () => {
      const req = mockRequest({ headers: { authorization: 'Bearer not-a-token' } });
      const next = mockNext();

      optionalAuth(req, mockResponse().asResponse, next);

      expect(req.user).toBeUndefined();
      expect(next).toHaveBeenCalledWith();
    });
  });

  describe('restrictTo', () => {
    it('should let allowed roles through', () => {
      const next = mockNext();
      restrictTo('admin')(mockRequest({ user: ADMIN }), mockResponse().asResponse, next);
      expect(next).toHaveBeenCalledWith();
    });

    it('should forbid other roles', () => {
      const next = mockNext();
      restrictTo('admin')(mockRequest({ user: STUDENT }), mockResponse().asResponse, next);
      expect(next.mock.calls[0]?.[0]).toMatchObject({ statusCode: 403, code: 'FORBIDDEN' });
    });
  });
});
