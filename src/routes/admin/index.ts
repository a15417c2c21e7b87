import { Router } from "express"

import { adminAuthMiddleware, optionalAdminAuth } from "../../middleware/admin-auth.js"
import type { DeskRouteDeps } from "../validation.js"
import { loginHandler, logoutHandler, statusHandler } from "./auth.js"
import { createReturnsRouter } from "./returns.js"

/**
 * Everything under /admin/api. Only the auth endpoints are reachable without
 * a valid admin cookie.
 */
export function createAdminRouter(deps: DeskRouteDeps): Router {
  const router = Router()

  router.post("/auth/login", loginHandler)
  router.post("/auth/logout", logoutHandler)
  router.get("/auth/status", optionalAdminAuth, statusHandler)

  router.use(adminAuthMiddleware, createReturnsRouter(deps))

  return router
}
