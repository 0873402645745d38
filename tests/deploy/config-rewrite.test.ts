// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import {
  replaceEnvValue,
  replaceRubyValue,
  rewriteReleaseConfigRb,
  rewriteReleaseEnv,
} from "../../src/deploy/config-rewrite";
import { TEST_DB } from "../helpers/layers";

describe("replaceEnvValue", () => {
  test("replaces the whole line of a matching key", () => {
    expect(replaceEnvValue("A=x-old-y\nB=old\n", "A", "old", "new")).toBe("A=new\nB=old\n");
  });

  test("leaves a key whose value lacks the old value", () => {
    expect(replaceEnvValue("A=other\n", "A", "old", "new")).toBe("A=other\n");
  });

  test("does not match keys that merely end with the key", () => {
    expect(replaceEnvValue("XA=old\n", "A", "old", "new")).toBe("XA=old\n");
  });
});

describe("replaceRubyValue", () => {
  test("replaces only the first occurrence after the key on a line", () => {
    expect(replaceRubyValue('K = "localhost" # localhost', "K", "localhost", "d.test")).toBe(
      'K = "d.test" # localhost'
    );
  });

  test("does not reach across lines", () => {
    expect(replaceRubyValue("K = 1\nlocalhost", "K", "localhost", "d.test")).toBe(
      "K = 1\nlocalhost"
    );
  });

  test("treats brackets in the key literally", () => {
    expect(replaceRubyValue("AppConfig[:x] = 'a'", "AppConfig[:x]", "a", "b")).toBe(
      "AppConfig[:x] = 'b'"
    );
  });
});

describe("rewriteReleaseEnv", () => {
  test("points the compose database at the configured name", () => {
    const content = [
      "MYSQL_DATABASE=archivesspace",
      "MYSQL_USER=as",
      "OTHER_DATABASE=archivesspace",
      "",
    ].join("\n");

    expect(rewriteReleaseEnv(content, TEST_DB)).toBe(
      ["MYSQL_DATABASE=archives", "MYSQL_USER=as", "OTHER_DATABASE=archivesspace", ""].join("\n")
    );
  });
});

describe("rewriteReleaseConfigRb", () => {
  test("rewrites the database URL and the public proxy URLs", () => {
    const content = [
      'AppConfig[:db_url] = "jdbc:mysql://db:3306/archivesspace?user=as&useUnicode=true"',
      'AppConfig[:frontend_proxy_url] = "http://localhost:8080"',
      'AppConfig[:public_proxy_url] = "http://localhost:8081"',
      'AppConfig[:oai_proxy_url] = "http://localhost:8082/oai"',
      'AppConfig[:solr_url] = "http://localhost:8983/solr/archivesspace"',
    ].join("\n");

    expect(rewriteReleaseConfigRb(content, TEST_DB, "archives.test")).toBe(
      [
        'AppConfig[:db_url] = "jdbc:mysql://db:3306/archives?user=as&useUnicode=true"',
        'AppConfig[:frontend_proxy_url] = "http://archives.test:8080"',
        'AppConfig[:public_proxy_url] = "http://archives.test:8081"',
        'AppConfig[:oai_proxy_url] = "http://archives.test:8082/oai"',
        'AppConfig[:solr_url] = "http://localhost:8983/solr/archivesspace"',
      ].join("\n")
    );
  });
});
