/**
 * Built-in default templates
 * These are used when no custom templates are configured
 */

export const HEADER_PARTIAL = `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>{{#if domain}}{{domain}} · {{/if}}{{siteTitle}}</title>
</head>
<body>
<header><h1><a href="/">{{siteTitle}}</a></h1></header>
<main>
`;

export const FOOTER_PARTIAL = `</main>
<footer>
<p>By <a href="{{siteAuthorUrl}}">{{siteAuthor}}</a>{{#if elapsedTime}} · Generated in {{elapsedTime}}s{{/if}}</p>
</footer>
</body>
</html>
`;

export const DEFAULT_HOME_TEMPLATE = `{{> header}}
<form method="post" action="/">
<label for="domain">Domain</label>
<input id="domain" name="domain" type="text" placeholder="example.com" required autofocus>
<button type="submit">Check</button>
</form>
{{> footer}}`;

export const DEFAULT_DOMAIN_TEMPLATE = `{{> header}}
<h2>{{domain}}</h2>
{{#each report}}
<section id="{{@key}}">
<h3>{{sectionTitle @key}}</h3>
{{renderValue this}}
</section>
{{/each}}
{{#if debug}}
<details><summary>Raw report</summary><pre>{{json report}}</pre></details>
{{/if}}
{{> footer}}`;

export const DEFAULT_NOT_FOUND_TEMPLATE = `{{> header}}
<h2>{{domain}}</h2>
<p>The domain <strong>{{domain}}</strong> does not exist.</p>
{{> footer}}`;

export const DEFAULT_ERROR_TEMPLATE = `{{> header}}
<h2>{{domain}}</h2>
<p class="error">The report for <strong>{{domain}}</strong> could not be retrieved.</p>
{{#if debug}}
<pre>{{message}}</pre>
{{/if}}
{{> footer}}`;
