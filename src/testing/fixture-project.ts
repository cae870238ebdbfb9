/**
 * A small Spring Boot + Vite application written to a temp directory.
 *
 *   backend/   Maven, Java 17, Spring Boot 3.2.1, H2 in memory, port 8081,
 *              one controller with three endpoints, no Dockerfile
 *   frontend/  Vite + React, npm with a lockfile, VITE_API_BASE_URL in .env
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

const FILES: Record<string, string> = {
  "backend/pom.xml": `<?xml version="1.0" encoding="UTF-8"?>
<project>
  <modelVersion>4.0.0</modelVersion>
  <parent>
    <groupId>org.springframework.boot</groupId>
    <artifactId>spring-boot-starter-parent</artifactId>
    <version>3.2.1</version>
  </parent>
  <groupId>com.example</groupId>
  <artifactId>demo</artifactId>
  <properties>
    <java.version>17</java.version>
  </properties>
  <dependencies>
    <dependency>
      <groupId>org.springframework.boot</groupId>
      <artifactId>spring-boot-starter-web</artifactId>
    </dependency>
    <dependency>
      <groupId>com.h2database</groupId>
      <artifactId>h2</artifactId>
      <scope>runtime</scope>
    </dependency>
  </dependencies>
</project>
`,
  "backend/src/main/resources/application.properties": `# Demo settings
server.port=8081
spring.datasource.url=jdbc:h2:mem:testdb
`,
  "backend/src/main/java/com/example/demo/DemoApplication.java": `package com.example.demo;

@SpringBootApplication
public class DemoApplication {
    public static void main(String[] args) {
        SpringApplication.run(DemoApplication.class, args);
    }
}
`,
  "backend/src/main/java/com/example/demo/TodoController.java": `package com.example.demo;

@RestController
@RequestMapping("/api/todos")
public class TodoController {
    @GetMapping
    public List<Todo> list() {
        return repository.findAll();
    }

    @PostMapping
    public Todo create(@RequestBody Todo todo) {
        return repository.save(todo);
    }

    @DeleteMapping("/{id}")
    public void delete(@PathVariable Long id) {
        repository.deleteById(id);
    }
}
`,
  "frontend/package.json": `{
  "name": "demo-ui",
  "private": true,
  "scripts": { "dev": "vite", "build": "vite build" },
  "dependencies": { "react": "^18.2.0", "react-dom": "^18.2.0" },
  "devDependencies": { "vite": "^5.0.0", "@vitejs/plugin-react": "^4.2.0" }
}
`,
  "frontend/package-lock.json": "{}\n",
  "frontend/.env": "VITE_API_BASE_URL=http://localhost:8081\n",
  "frontend/src/api.js": `const BASE = "http://localhost:8081/api";
export const docs = 'https://example.test/docs';
export const list = () => fetch(\`\${BASE}/todos\`);
`,
};

export interface FixtureProject {
  root: string;
  write(relative: string, content: string): void;
  remove(relative: string): void;
  cleanup(): void;
}

export function createFixtureProject(): FixtureProject {
  const root = mkdtempSync(join(tmpdir(), "migration-fixture-"));

  const write = (relative: string, content: string) => {
    const path = join(root, relative);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, "utf-8");
  };

  for (const [relative, content] of Object.entries(FILES)) {
    write(relative, content);
  }

  return {
    root,
    write,
    remove: (relative) => rmSync(join(root, relative), { recursive: true, force: true }),
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}
