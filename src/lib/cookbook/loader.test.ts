import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { parseCookbook, loadCookbookDir, listCookbookFiles } from "./loader.js";
import { orderedResources, resourceId } from "./model.js";
import { ErrorCode, ParseError } from "../errors.js";

const WEB = `
name: web
version: 1.2
description: nginx front end
vars:
  workers: 4
configure:
  services:
    - name: nginx
      state: restarted
      enabled: true
  files:
    - path: /etc/nginx/nginx.conf
      template: true
      content: |
        worker_processes {{ workers }};
      owner: root
      group: root
      mode: 0644
      notify: [nginx]
install:
  post_install:
    - command: nginx -t
  install:
    - package: nginx
      version: latest
    - package: curl
    - package: openssl
      version: "3.0.2"
  pre_install:
    - command: apt-get update
      elevate: true
      timeout: 90
      creates: /var/lib/larder/apt-updated
remove:
  packages:
    - name: apache2
`;

function parseError(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error("expected ParseError");
}

describe("parseCookbook", () => {
  it("builds typed sections from the document", () => {
    const cookbook = parseCookbook(WEB, "web.yaml");
    expect(cookbook.name).toBe("web");
    expect(cookbook.version).toBe("1.2");
    expect(cookbook.sections.install.map((p) => p.version)).toEqual([
      { kind: "latest" },
      { kind: "any" },
      { kind: "exact", value: "3.0.2" },
    ]);
    expect(cookbook.sections.remove).toEqual([
      { kind: "package", name: "apache2", version: { kind: "any" }, presence: "absent" },
    ]);
    expect(cookbook.sections.pre_install[0]).toEqual({
      kind: "command",
      name: undefined,
      line: "apt-get update",
      argv: ["apt-get", "update"],
      elevate: true,
      phase: "pre",
      timeoutMs: 90_000,
      creates: "/var/lib/larder/apt-updated",
    });
  });

  it("renders templates and normalises file fields", () => {
    const [file] = parseCookbook(WEB, "web.yaml").sections["configure.files"];
    expect(file.content).toBe("worker_processes 4;\n");
    expect(file.mode).toBe("0644");
    expect(file.owner).toBe("root");
    expect(file.notify).toEqual(["nginx"]);
    expect(file.presence).toBe("present");
  });

  it("orders resources by section regardless of document order", () => {
    const ids = orderedResources(parseCookbook(WEB, "web.yaml")).map((p) => `${p.section}:${resourceId(p.resource)}`);
    expect(ids).toEqual([
      "pre_install:command.apt-get update",
      "remove:package.apache2",
      "install:package.nginx",
      "install:package.curl",
      "install:package.openssl",
      "configure.files:file./etc/nginx/nginx.conf",
      "configure.services:service.nginx",
      "post_install:command.nginx -t",
    ]);
  });

  it("accepts empty sections", () => {
    const cookbook = parseCookbook("name: empty\nversion: '1'\ninstall:\nconfigure:\n  files:\n", "empty.yaml");
    expect(orderedResources(cookbook)).toEqual([]);
  });

  it("rejects malformed YAML", () => {
    const error = parseError(() => parseCookbook("name: [unclosed", "bad.yaml"));
    expect(error.source).toBe("bad.yaml");
    expect(error.code).toBe(ErrorCode.PARSE_FAILED);
  });

  it("rejects a non-mapping document", () => {
    const error = parseError(() => parseCookbook("- a\n- b\n", "list.yaml"));
    expect(error.issues).toEqual([{ path: "", message: "Cookbook must be a YAML mapping" }]);
  });

  it("rejects unknown keys", () => {
    const error = parseError(() =>
      parseCookbook("name: x\nversion: '1'\nconfigure:\n  firewall: []\n", "x.yaml")
    );
    expect(error.issues[0].path).toBe("configure");
  });

  it("rejects relative file paths", () => {
    const error = parseError(() =>
      parseCookbook("name: x\nversion: '1'\nconfigure:\n  files:\n    - path: etc/motd\n", "x.yaml")
    );
    expect(error.issues).toEqual([{ path: "configure.files.0.path", message: "File path must be absolute" }]);
  });

  it("rejects invalid modes", () => {
    const error = parseError(() =>
      parseCookbook("name: x\nversion: '1'\nconfigure:\n  files:\n    - path: /etc/motd\n      mode: '0999'\n", "x.yaml")
    );
    expect(error.issues).toEqual([{ path: "configure.files.0.mode", message: "Invalid file mode: 0999" }]);
  });

  it("rejects undefined template variables", () => {
    const error = parseError(() =>
      parseCookbook(
        "name: x\nversion: '1'\nconfigure:\n  files:\n    - path: /etc/motd\n      template: true\n      content: '{{ banner }}'\n",
        "x.yaml"
      )
    );
    expect(error.issues).toEqual([{ path: "configure.files.0.content", message: "Undefined template variable: banner" }]);
  });

  it("takes template variables from options when the cookbook has none", () => {
    const cookbook = parseCookbook(
      "name: x\nversion: '1'\nconfigure:\n  files:\n    - path: /etc/motd\n      template: true\n      content: 'host {{ hostname }}'\n",
      "x.yaml",
      { vars: { hostname: "web-01" } }
    );
    expect(cookbook.sections["configure.files"][0].content).toBe("host web-01\n");
  });

  it("rejects duplicate identities", () => {
    const error = parseError(() =>
      parseCookbook(
        "name: x\nversion: '1'\nremove:\n  packages:\n    - name: nginx\ninstall:\n  install:\n    - package: nginx\n",
        "x.yaml"
      )
    );
    expect(error.code).toBe(ErrorCode.PARSE_DUPLICATE_RESOURCE);
    expect(error.issues).toEqual([{ path: "install", message: "Duplicate resource package.nginx" }]);
  });

  it("rejects an unterminated quote in a command", () => {
    const error = parseError(() =>
      parseCookbook("name: x\nversion: '1'\ninstall:\n  post_install:\n    - command: \"echo 'hi\"\n", "x.yaml")
    );
    expect(error.issues[0].path).toBe("install.post_install.0.command");
  });
});

describe("loadCookbookDir", () => {
  const DIR = join(tmpdir(), `larder-cookbook-dir-${Date.now()}`);

  beforeAll(() => {
    mkdirSync(DIR, { recursive: true });
    writeFileSync(join(DIR, "b-web.yaml"), WEB);
    writeFileSync(join(DIR, "a-base.yml"), "name: base\nversion: '1'\n");
    writeFileSync(join(DIR, "notes.txt"), "not a cookbook");
  });

  afterAll(() => {
    rmSync(DIR, { recursive: true, force: true });
  });

  it("lists yaml files in name order", () => {
    expect(listCookbookFiles(DIR)).toEqual([join(DIR, "a-base.yml"), join(DIR, "b-web.yaml")]);
  });

  it("loads every cookbook", () => {
    expect(loadCookbookDir(DIR).map((c) => c.name)).toEqual(["base", "web"]);
  });

  it("rejects the whole set when one file is invalid", () => {
    writeFileSync(join(DIR, "c-broken.yaml"), "name: broken\n");
    expect(() => loadCookbookDir(DIR)).toThrow(ParseError);
    rmSync(join(DIR, "c-broken.yaml"));
  });
});
