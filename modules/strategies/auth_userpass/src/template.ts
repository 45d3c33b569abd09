/**
 * SSO Login - Login Form Template Renderer
 *
 * Renders the username/password(/organization) form from a view model with
 * Handlebars. The template is compiled once per container on first use.
 * All values are HTML-escaped by Handlebars.
 */

import { readFileSync } from 'node:fs';
import Handlebars from 'handlebars';
import { AUTH_STATE_PARAM, getErrorCodeMessage, type ErrorCodeMessage } from '@sso-login/shared';
import type { LoginLink, LoginView } from './types';

// =============================================================================
// Template Data
// =============================================================================

export interface LoginTemplateData {
    brandName: string;
    formAction: string;
    username: string;
    forceUsername: boolean;
    rememberUsernameEnabled: boolean;
    rememberUsernameChecked: boolean;
    rememberMeEnabled: boolean;
    rememberMeChecked: boolean;
    rememberOrganizationEnabled: boolean;
    rememberOrganizationChecked: boolean;
    /** Set whenever a list is offered, even an empty one */
    showOrganizations: boolean;
    organizations?: Array<{ id: string; displayName: string; selected: boolean }>;
    links: LoginLink[];
    error?: ErrorCodeMessage;
}

type LoginTemplate = (data: LoginTemplateData) => string;

let compiled: LoginTemplate | null = null;

function getTemplate(): LoginTemplate {
    if (!compiled) {
        const source = readFileSync(new URL('./templates/loginuserpass.hbs', import.meta.url), 'utf-8');
        compiled = Handlebars.compile<LoginTemplateData>(source);
    }
    return compiled;
}

/**
 * The form posts back to the same endpoint, carrying the current state id.
 */
export function formActionFor(view: LoginView): string {
    const params = new URLSearchParams(view.queryParams ?? { [AUTH_STATE_PARAM]: view.authState });
    return `?${params.toString()}`;
}

export function toTemplateData(view: LoginView, brandName: string): LoginTemplateData {
    const data: LoginTemplateData = {
        brandName,
        formAction: formActionFor(view),
        username: view.username,
        forceUsername: false,
        rememberUsernameEnabled: view.rememberUsernameEnabled,
        rememberUsernameChecked: view.rememberUsernameChecked,
        rememberMeEnabled: false,
        rememberMeChecked: false,
        rememberOrganizationEnabled: false,
        rememberOrganizationChecked: false,
        showOrganizations: false,
        links: view.links,
    };

    if (view.errorCode !== null) {
        data.error = getErrorCodeMessage(view.errorCode, view.errorParams ?? {});
    }

    if (view.variant === 'userpass') {
        data.forceUsername = view.forceUsername;
        data.rememberMeEnabled = view.rememberMeEnabled;
        data.rememberMeChecked = view.rememberMeChecked;
    } else {
        data.rememberOrganizationEnabled = view.rememberOrganizationEnabled;
        data.rememberOrganizationChecked = view.rememberOrganizationChecked;
        if (view.organizations) {
            data.showOrganizations = true;
            const selectedOrg = view.selectedOrg;
            data.organizations = view.organizations.map(org => ({
                id: org.id,
                displayName: org.displayName,
                selected: org.id === selectedOrg,
            }));
        }
    }

    return data;
}

/**
 * Render the login form HTML.
 */
export function renderLoginPage(view: LoginView, brandName: string): string {
    return getTemplate()(toTemplateData(view, brandName));
}
