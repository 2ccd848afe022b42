import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import { ErrorKind, isEditorError, MissingInterfaceError } from "./errors";
import { logger } from "./logger";
import { LexiconEditor } from "./services/editor";
import { SqlLexiconStore } from "./services/lexiconStore";

const STATUS: Record<ErrorKind, number> = {
  NotFound: 404,
  InvalidShape: 400,
  AmbiguousMatch: 409,
  SchemaMismatch: 500,
  MissingInterface: 501,
  BackingStore: 502
};

type Body = Record<string, unknown>;

const bodyOf = (req: Request): Body =>
  typeof req.body === "object" && req.body !== null && !Array.isArray(req.body) ? req.body : {};

const str = (body: Body, name: string): string | undefined => {
  const value = body[name];
  return typeof value === "string" ? value : undefined;
};

const strList = (body: Body, name: string): string[] | undefined => {
  const value = body[name];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : undefined;
};

const countOf = (body: Body): number | string | undefined => {
  const value = body.count;
  return typeof value === "number" || typeof value === "string" ? value : undefined;
};

const queryStr = (req: Request, name: string): string | undefined => {
  const value = req.query[name];
  return typeof value === "string" ? value : undefined;
};

type Handler = (req: Request, res: Response) => unknown;

// Express 4 does not await handlers; rejections go to the error middleware.
const handle =
  (fn: Handler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };

/**
 * HTTP surface over one editor session. The store is optional; without it the
 * commit and store routes answer 501.
 */
export const createApp = (editor: LexiconEditor, store?: SqlLexiconStore) => {
  const app = express();
  app.use(express.json());
  app.use(cors());

  const requireStore = (): SqlLexiconStore => {
    if (!store) throw new MissingInterfaceError("persistent storage to this session");
    return store;
  };

  app.get("/api/lexicon", (_req, res) => {
    res.json({ ...editor.getMetadata(), lmfVersion: editor.lmfVersion, stats: editor.stats() });
  });

  app.patch(
    "/api/lexicon",
    handle((req, res) => {
      const body = bodyOf(req);
      editor.updateMetadata({
        id: str(body, "id"),
        label: str(body, "label"),
        language: str(body, "language"),
        email: str(body, "email"),
        license: str(body, "license"),
        version: str(body, "version"),
        url: str(body, "url"),
        citation: str(body, "citation")
      });
      const lmfVersion = str(body, "lmfVersion");
      if (lmfVersion !== undefined) editor.setLmfVersion(lmfVersion);
      res.json(editor.getMetadata());
    })
  );

  app.get(
    "/api/synsets/:id",
    handle((req, res) => {
      const synset = editor.getSynset(req.params.id);
      if (!synset) return res.status(404).json({ error: `synset not found: ${req.params.id}` });
      res.json({ ...synset, senses: editor.sensesOf(synset.id) });
    })
  );

  app.post(
    "/api/synsets",
    handle((req, res) => {
      const body = bodyOf(req);
      const synset = editor.createSynset({
        pos: str(body, "pos") ?? "",
        definition: str(body, "definition"),
        examples: strList(body, "examples"),
        words: strList(body, "words"),
        ili: str(body, "ili")
      });
      res.status(201).json(synset);
    })
  );

  app.patch(
    "/api/synsets/:id",
    handle((req, res) => {
      const body = bodyOf(req);
      res.json(
        editor.modifySynset(req.params.id, {
          definition: str(body, "definition"),
          addDefinitions: strList(body, "addDefinitions"),
          addExamples: strList(body, "addExamples"),
          ili: str(body, "ili")
        })
      );
    })
  );

  app.delete(
    "/api/synsets/:id",
    handle((req, res) => {
      res.json(editor.removeSynset(req.params.id));
    })
  );

  app.post(
    "/api/synsets/:id/words",
    handle((req, res) => {
      const body = bodyOf(req);
      const attachment = editor.addWordToSynset(req.params.id, str(body, "lemma") ?? "", {
        pos: str(body, "pos"),
        adjposition: str(body, "adjposition"),
        count: countOf(body)
      });
      res.status(201).json(attachment);
    })
  );

  app.post(
    "/api/synsets/:id/relations",
    handle((req, res) => {
      const body = bodyOf(req);
      const result = editor.addSynsetRelation(req.params.id, str(body, "target") ?? "", str(body, "relType") ?? "", {
        validate: body.validate !== false
      });
      res.status(201).json(result);
    })
  );

  app.delete(
    "/api/synsets/:id/relations/:target",
    handle((req, res) => {
      res.json({ removed: editor.removeSynsetRelation(req.params.id, req.params.target, queryStr(req, "relType")) });
    })
  );

  app.get(
    "/api/entries",
    handle((req, res) => {
      res.json(editor.findEntries(queryStr(req, "lemma") ?? "", queryStr(req, "pos")));
    })
  );

  app.get(
    "/api/entries/:id",
    handle((req, res) => {
      const entry = editor.getEntry(req.params.id);
      if (!entry) return res.status(404).json({ error: `entry not found: ${req.params.id}` });
      res.json(entry);
    })
  );

  app.post(
    "/api/entries",
    handle((req, res) => {
      const body = bodyOf(req);
      const entry = editor.createEntry(str(body, "lemma") ?? "", str(body, "pos") ?? "", { forms: strList(body, "forms") });
      res.status(201).json(entry);
    })
  );

  app.patch(
    "/api/entries/:id",
    handle((req, res) => {
      const body = bodyOf(req);
      res.json(editor.modifyEntry(req.params.id, { lemma: str(body, "lemma"), addForms: strList(body, "addForms") }));
    })
  );

  app.delete(
    "/api/entries/:id",
    handle((req, res) => {
      res.json(editor.removeEntry(req.params.id));
    })
  );

  app.get(
    "/api/senses/:id",
    handle((req, res) => {
      const sense = editor.getSense(req.params.id);
      if (!sense) return res.status(404).json({ error: `sense not found: ${req.params.id}` });
      res.json(sense);
    })
  );

  app.patch(
    "/api/senses/:id",
    handle((req, res) => {
      const body = bodyOf(req);
      const count = countOf(body);
      res.json(
        editor.modifySense(req.params.id, {
          adjposition: str(body, "adjposition"),
          addCounts: count === undefined ? undefined : [count],
          addExamples: strList(body, "addExamples")
        })
      );
    })
  );

  app.delete(
    "/api/senses/:id",
    handle((req, res) => {
      res.json(editor.removeSense(req.params.id));
    })
  );

  app.post(
    "/api/senses/:id/relations",
    handle((req, res) => {
      const body = bodyOf(req);
      const result = editor.addSenseRelation(req.params.id, str(body, "target") ?? "", str(body, "relType") ?? "", {
        validate: body.validate !== false
      });
      res.status(201).json(result);
    })
  );

  app.delete(
    "/api/senses/:id/relations/:target",
    handle((req, res) => {
      res.json({ removed: editor.removeSenseRelation(req.params.id, req.params.target, queryStr(req, "relType")) });
    })
  );

  app.get("/api/validate", (_req, res) => {
    res.json(editor.validate());
  });

  app.get("/api/export", (_req, res) => {
    res.type("application/xml").send(editor.dump());
  });

  app.get(
    "/api/store/lexicons",
    handle(async (_req, res) => {
      res.json(await requireStore().listLexicons());
    })
  );

  app.post(
    "/api/commit",
    handle(async (_req, res) => {
      await editor.commit(requireStore(), { validate: true });
      res.json({ success: true });
    })
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isEditorError(err)) {
      return res.status(STATUS[err.kind]).json({ error: err.message, kind: err.kind });
    }
    logger.error("Unhandled request error", err);
    res.status(500).json({ error: "Internal error" });
  });

  return app;
};
