import { SignJWT, jwtVerify } from "jose";
import type { NextRequest, NextResponse } from "next/server";
import { getEnv } from "@/lib/env";

const SESSION_COOKIE = "gallery_session";
const SESSION_ALGO = "HS256";

type SessionPayload = {
  sid: string;
};

const getSecretKey = (): Uint8Array => {
  return new TextEncoder().encode(getEnv().sessionSecret);
};

// The cookie must outlive a lockout, or clearing it would be a way around one.
const cookieLifetimeSeconds = (): number => {
  const env = getEnv();
  return Math.max(env.sessionTimeoutSeconds, env.authLockoutSeconds);
};

const createSessionToken = async (sessionId: string): Promise<string> => {
  const payload: SessionPayload = { sid: sessionId };

  return new SignJWT(payload)
    .setProtectedHeader({ alg: SESSION_ALGO })
    .setIssuedAt()
    .setExpirationTime(`${cookieLifetimeSeconds()}s`)
    .sign(getSecretKey());
};

const verifySessionToken = async (token: string): Promise<string | null> => {
  try {
    const { payload } = await jwtVerify<SessionPayload>(token, getSecretKey(), {
      algorithms: [SESSION_ALGO],
    });

    return typeof payload.sid === "string" && payload.sid.length > 0 ? payload.sid : null;
  } catch {
    return null;
  }
};

export const newSessionId = (): string => crypto.randomUUID();

export const getSessionId = async (request: NextRequest): Promise<string | null> => {
  const token = request.cookies.get(SESSION_COOKIE)?.value;
  if (!token) {
    return null;
  }

  return verifySessionToken(token);
};

export const setSessionCookie = async (response: NextResponse, sessionId: string): Promise<void> => {
  const token = await createSessionToken(sessionId);

  response.cookies.set({
    name: SESSION_COOKIE,
    value: token,
    httpOnly: true,
    secure: process.env.NODE_ENV === "production",
    sameSite: "lax",
    path: "/",
    maxAge: cookieLifetimeSeconds(),
  });
};
