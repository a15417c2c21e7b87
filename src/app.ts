import express, { type Express } from "express"
import cors from "cors"
import cookieParser from "cookie-parser"

import { createRequestLogger } from "./lib/logger.js"
import { errorHandler } from "./middleware/error-handler.js"
import { createAdminRouter } from "./routes/admin/index.js"
import { createDeskRouter } from "./routes/desk.js"
import { createReadersRouter } from "./routes/readers.js"
import { createRpaRouter } from "./routes/rpa.js"
import type { DeskRouteDeps } from "./routes/validation.js"

export function createApp(deps: DeskRouteDeps): Express {
  const app = express()

  app.set("trust proxy", true)
  app.use(cors())
  app.use(express.json())
  app.use(cookieParser())

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now()
    res.on("finish", () => {
      createRequestLogger(req.method, req.originalUrl.split("?")[0]).debug(
        { status: res.statusCode, durationMs: Date.now() - start },
        "Request completed"
      )
    })
    next()
  })

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" })
  })

  app.use("/rpa", createRpaRouter(deps))
  app.use("/api/readers", createReadersRouter(deps.desk))
  app.use("/api/desk", createDeskRouter(deps))
  app.use("/admin/api", createAdminRouter(deps))

  app.use(errorHandler)

  return app
}
