/**
 * Template Registry
 * Built-in systemd unit templates for Python daemons
 */

import { UnknownTemplateError } from "../utils/errors.js";
import type { ServiceConfigField, TemplateId } from "../config/types.js";
import { TEMPLATE_IDS } from "../config/types.js";

/**
 * A unit-file template with `{{ field }}` placeholders.
 * A line holding only `{{ additional_env_vars }}` expands to one
 * `Environment=` line per entry.
 */
export interface ServiceTemplate {
  id: TemplateId;
  name: string;
  description: string;
  body: string;
  /** Fields that must be non-empty before rendering */
  requiredFields: readonly ServiceConfigField[];
}

const SERVICE_SECTION_TAIL = `WorkingDirectory={{ working_directory }}
User={{ user }}
Group={{ group }}
Restart={{ restart_policy }}
RestartSec={{ restart_sec }}
Environment="PATH={{ venv_path }}/bin:$PATH"
Environment="PYTHONUNBUFFERED=1"
{{ additional_env_vars }}

[Install]
WantedBy=multi-user.target
`;

const STANDARD_PYTHON_TEMPLATE = `[Unit]
Description={{ description }}
After=network.target

[Service]
ExecStart=/bin/bash -c "source {{ venv_path }}/bin/activate && python3 {{ script_path }} {{ script_args }}"
${SERVICE_SECTION_TAIL}`;

const GUNICORN_TEMPLATE = `[Unit]
Description={{ description }}
After=network.target

[Service]
ExecStart=/bin/bash -c "source {{ venv_path }}/bin/activate && gunicorn --bind {{ bind_address }} {{ app_module }}"
${SERVICE_SECTION_TAIL}`;

const TEMPLATES: Readonly<Record<TemplateId, ServiceTemplate>> = Object.freeze({
  standard_python: {
    id: "standard_python",
    name: "Standard Python Script",
    description: "Run a Python script in a virtual environment",
    body: STANDARD_PYTHON_TEMPLATE,
    requiredFields: ["script_path"],
  },
  gunicorn: {
    id: "gunicorn",
    name: "Gunicorn Web Application",
    description: "Run a Flask/Django app with Gunicorn",
    body: GUNICORN_TEMPLATE,
    requiredFields: ["app_module"],
  },
});

/**
 * Look up a template, throwing UnknownTemplateError for unregistered ids
 */
export function getTemplate(id: string): ServiceTemplate {
  const template = TEMPLATE_IDS.find((known) => known === id);
  if (!template) {
    throw new UnknownTemplateError(id);
  }
  return TEMPLATES[template];
}

/**
 * All templates in menu order
 */
export function listTemplates(): ServiceTemplate[] {
  return TEMPLATE_IDS.map((id) => TEMPLATES[id]);
}
