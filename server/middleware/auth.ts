import type { FastifyReply, FastifyRequest } from "fastify";
import * as jwt from "jsonwebtoken";
import { z } from "zod";

import { env } from "../config/env";

export interface Identity {
  id: string;
  email: string;
}

declare module "fastify" {
  interface FastifyRequest {
    identity?: Identity;
  }
}

const identityClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email(),
});

export async function requireIdentity(
  req: FastifyRequest,
  reply: FastifyReply,
) {
  const auth = req.headers["authorization"];
  if (!auth || !auth.startsWith("Bearer ")) {
    return reply.status(401).send({
      code: "UNAUTHORIZED",
      message: "Missing or invalid Authorization header",
    });
  }

  const token = auth.slice("Bearer ".length);
  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, env.JWT_SECRET);
  } catch (error) {
    req.log.debug({ err: error }, "[AUTH] Token verification failed");
    return reply
      .status(401)
      .send({ code: "UNAUTHORIZED", message: "Invalid or expired token" });
  }

  const claims = identityClaimsSchema.safeParse(payload);
  if (!claims.success) {
    return reply.status(401).send({
      code: "UNAUTHORIZED",
      message: "Token is missing identity claims",
    });
  }

  req.identity = { id: claims.data.sub, email: claims.data.email };
}

export function identityOf(req: FastifyRequest): Identity {
  if (!req.identity) {
    throw new Error("requireIdentity must run before identityOf");
  }
  return req.identity;
}
