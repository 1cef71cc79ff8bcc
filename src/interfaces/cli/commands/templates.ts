export function renderProjectTemplate(projectName: string): string {
  return `# muxenv project: ${projectName}
session_name: ${projectName}

# Directory every window and pane starts in. Defaults to your home directory.
project_root: ~/src/${projectName}

# Exported into the tmux session.
environment:
  PROJECT_NAME: ${projectName}

# Windows are created in order. Each pane runs its command on start.
windows:
  - name: editor
    panes:
      - $EDITOR
  - name: shell
    layout: even-horizontal
    panes:
      - git status
      - ls

# Uncomment to give the project its own virtualenv.
# virtualenv:
#   python_binary: python3
#   use_site_packages: false
`
}
