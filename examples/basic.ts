import { createRouter, MethodSet, wrapFetch, routeParams, z } from "../src/index.js";
import { serve } from "../src/adapters/node.js";

const router = createRouter({
  hooks: {
    onResponse: ({ method, path, outcome, response, durationMs }) => {
      console.log(`${method} ${path} -> ${response.status} (${outcome}, ${durationMs}ms)`);
    },
  },
});

const createUser = z.object({
  name: z.string().min(2),
  email: z.email(),
});

router.get("/", (ctx) => ctx.html(200, "<h1>slugroute</h1>"));

router.get("/users/{id}", (ctx) => ctx.json(200, { id: ctx.params["id"], name: "Ada" }));

router.post("/users", async (ctx) => {
  const body = await ctx.readJson(createUser);
  return ctx.json(201, { id: crypto.randomUUID(), ...body });
});

// Everything under /docs/ that has no page of its own lands on the index.
router
  .get("/docs/", (ctx) => ctx.text(200, `docs index (asked for ${ctx.path})`))
  .matchAny(MethodSet.get());

router.get(
  "/raw/{name}",
  wrapFetch((request) => new Response(`raw ${routeParams(request)["name"]}`))
);

router.default(MethodSet.any(), (ctx) => ctx.json(404, { error: `Nothing at ${ctx.path}` }));

serve(router, { port: process.env.PORT ?? 3000 });
